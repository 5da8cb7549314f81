import { logger } from './logger';
import { EventEmitter } from 'events';
import { sleep, toError } from './ts';

export type RecoverableService = 'irc' | 'persistence';

/** All durations in milliseconds */
export interface RecoveryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  /** Fraction of the delay added or removed at random */
  jitterRange: number;
  /** Consecutive failures that open the breaker */
  circuitBreakerThreshold: number;
  circuitBreakerTimeout: number;
  /** How long one attemptReconnection may take before it counts as failed */
  attemptTimeout: number;
}

const DEFAULT_RECOVERY: RecoveryConfig = {
  maxRetries: 5,
  baseDelay: 1000,
  maxDelay: 60 * 1000,
  jitterRange: 0.2,
  circuitBreakerThreshold: 3,
  circuitBreakerTimeout: 5 * 60 * 1000,
  attemptTimeout: 30 * 1000,
};

export interface ServiceHealth {
  isHealthy: boolean;
  lastSuccessful: number;
  consecutiveFailures: number;
  totalFailures: number;
  lastError?: Error;
}

export interface RecoveryAttempt {
  service: RecoverableService;
  attempt: number;
  timestamp: number;
  delay: number;
  success: boolean;
  error?: Error;
}

/**
 * Tracks health of the IRC link and the case store and retries whichever one
 * failed. The owner does the actual reconnecting by listening for
 * `attemptReconnection` and calling back with the outcome.
 */
export class RecoveryManager extends EventEmitter {
  private config: RecoveryConfig;
  private health = new Map<RecoverableService, ServiceHealth>();
  private recoveryHistory: RecoveryAttempt[] = [];
  private circuitBreakers = new Map<RecoverableService, number>(); // service -> trip time
  private recovering = new Set<RecoverableService>();
  private destroyed = false;

  constructor(config: Partial<RecoveryConfig> = {}) {
    super();
    this.config = { ...DEFAULT_RECOVERY, ...config };
  }

  private healthOf(service: RecoverableService): ServiceHealth {
    let health = this.health.get(service);
    if (!health) {
      health = { isHealthy: true, lastSuccessful: Date.now(), consecutiveFailures: 0, totalFailures: 0 };
      this.health.set(service, health);
    }
    return health;
  }

  recordSuccess(service: RecoverableService): void {
    const health = this.healthOf(service);
    health.isHealthy = true;
    health.lastSuccessful = Date.now();
    health.consecutiveFailures = 0;
    this.circuitBreakers.delete(service);

    logger.debug(`${service} marked as healthy`);
    this.emit('serviceHealthy', service, health);
  }

  /**
   * Record a failure and start recovery unless one is already running
   */
  recordFailure(service: RecoverableService, error: Error): Promise<void> {
    const health = this.healthOf(service);
    health.isHealthy = false;
    health.consecutiveFailures++;
    health.totalFailures++;
    health.lastError = error;

    if (health.consecutiveFailures >= this.config.circuitBreakerThreshold && !this.circuitBreakers.has(service)) {
      this.circuitBreakers.set(service, Date.now());
      logger.warn(`Circuit breaker tripped for ${service} after ${health.consecutiveFailures} failures`);
      this.emit('circuitBreakerTripped', service, health);
    }

    logger.error(`${service} failure recorded:`, error.message);
    this.emit('serviceUnhealthy', service, health, error);

    return this.triggerRecovery(service, error);
  }

  /**
   * False while the service's circuit breaker is open
   */
  isServiceAvailable(service: RecoverableService): boolean {
    const tripTime = this.circuitBreakers.get(service);
    if (tripTime === undefined) return true;

    if (Date.now() - tripTime > this.config.circuitBreakerTimeout) {
      this.circuitBreakers.delete(service);
      logger.info(`Circuit breaker reset for ${service}`);
      this.emit('circuitBreakerReset', service);
      return true;
    }
    return false;
  }

  isRecovering(service: RecoverableService): boolean {
    return this.recovering.has(service);
  }

  private async triggerRecovery(service: RecoverableService, error: Error): Promise<void> {
    if (this.destroyed) return;
    if (this.recovering.has(service)) {
      logger.debug(`Recovery already in progress for ${service}`);
      return;
    }
    if (!this.isServiceAvailable(service)) {
      logger.debug(`${service} circuit breaker is open, skipping recovery`);
      return;
    }

    this.recovering.add(service);
    try {
      await this.executeRecovery(service, error);
    } finally {
      this.recovering.delete(service);
    }
  }

  /**
   * Retry with exponential backoff until the owner reports success or the
   * attempts run out
   */
  private async executeRecovery(service: RecoverableService, initialError: Error): Promise<void> {
    logger.info(`Starting recovery for ${service}: ${initialError.message}`);
    this.emit('recoveryStarted', service, initialError, this.config.maxRetries);

    let lastError = initialError;
    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      const delay = this.calculateDelay(attempt);
      logger.info(`Recovery attempt ${attempt}/${this.config.maxRetries} for ${service} in ${delay}ms`);
      this.emit('recoveryAttempt', service, attempt, this.config.maxRetries);
      await sleep(delay);
      if (this.destroyed) return;

      const record: RecoveryAttempt = { service, attempt, timestamp: Date.now(), delay, success: false };
      try {
        record.success = await this.attemptRecovery(service);
      } catch (error) {
        record.error = toError(error);
        lastError = record.error;
        logger.error(`Recovery attempt ${attempt} for ${service} threw:`, error);
      }
      this.recoveryHistory.push(record);

      if (record.success) {
        logger.info(`Recovery successful for ${service} on attempt ${attempt}`);
        this.recordSuccess(service);
        this.emit('recoverySucceeded', service, attempt);
        return;
      }
    }

    logger.error(`All ${this.config.maxRetries} recovery attempts exhausted for ${service}`);
    this.emit('recoveryFailed', service, lastError);
  }

  private attemptRecovery(service: RecoverableService): Promise<boolean> {
    if (this.listenerCount('attemptReconnection') === 0) {
      logger.warn(`Nobody handles recovery for ${service}`);
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        logger.warn(`Recovery attempt for ${service} timed out`);
        resolve(false);
      }, this.config.attemptTimeout);

      this.emit('attemptReconnection', service, (success: boolean) => {
        clearTimeout(timer);
        resolve(success);
      });
    });
  }

  /**
   * Exponential backoff with jitter
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = Math.min(
      this.config.baseDelay * Math.pow(2, attempt - 1),
      this.config.maxDelay
    );
    const jitter = exponentialDelay * this.config.jitterRange * (Math.random() * 2 - 1);
    return Math.floor(Math.max(0, exponentialDelay + jitter));
  }

  getHealthStatus(): {
    services: Partial<Record<RecoverableService, ServiceHealth>>;
    recovering: RecoverableService[];
    circuitBreakers: Partial<Record<RecoverableService, number>>;
    recoveryHistory: RecoveryAttempt[];
  } {
    return {
      services: Object.fromEntries(Array.from(this.health, ([service, health]) => [service, { ...health }])),
      recovering: Array.from(this.recovering),
      circuitBreakers: Object.fromEntries(this.circuitBreakers),
      recoveryHistory: this.recoveryHistory.slice(-10) // Last 10 attempts
    };
  }

  resetCircuitBreaker(service: RecoverableService): void {
    this.circuitBreakers.delete(service);
    this.healthOf(service).consecutiveFailures = 0;
    logger.info(`Circuit breaker manually reset for ${service}`);
    this.emit('circuitBreakerReset', service);
  }

  destroy(): void {
    this.destroyed = true;
    this.removeAllListeners();
    logger.info('Recovery manager destroyed');
  }
}
