import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RecoveryManager, type RecoverableService } from '../lib/recovery-manager';

vi.mock('../lib/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('RecoveryManager', () => {
  let manager: RecoveryManager;

  beforeEach(() => {
    manager = new RecoveryManager({
      maxRetries: 3,
      baseDelay: 1,
      maxDelay: 4,
      jitterRange: 0,
      circuitBreakerThreshold: 3,
      circuitBreakerTimeout: 60000,
      attemptTimeout: 50,
    });
  });

  afterEach(() => {
    manager.destroy();
  });

  it('retries until the owner reports success', async () => {
    let attempts = 0;
    manager.on('attemptReconnection', (_service: RecoverableService, callback: (success: boolean) => void) => {
      attempts++;
      callback(attempts === 2);
    });
    const succeeded = vi.fn();
    manager.on('recoverySucceeded', succeeded);

    await manager.recordFailure('persistence', new Error('disk full'));

    expect(attempts).toBe(2);
    expect(succeeded).toHaveBeenCalledWith('persistence', 2);
    expect(manager.getHealthStatus().services.persistence).toMatchObject({
      isHealthy: true,
      consecutiveFailures: 0,
      totalFailures: 1,
    });
  });

  it('gives up after maxRetries', async () => {
    manager.on('attemptReconnection', (_service: RecoverableService, callback: (success: boolean) => void) => {
      callback(false);
    });
    const failed = vi.fn();
    manager.on('recoveryFailed', failed);

    const error = new Error('connection refused');
    await manager.recordFailure('irc', error);

    expect(failed).toHaveBeenCalledWith('irc', error);
    expect(manager.getHealthStatus().recoveryHistory).toHaveLength(3);
    expect(manager.isRecovering('irc')).toBe(false);
  });

  it('treats a callback that never comes as a failed attempt', async () => {
    manager.on('attemptReconnection', () => {});
    const failed = vi.fn();
    manager.on('recoveryFailed', failed);

    await manager.recordFailure('irc', new Error('silent'));
    expect(failed).toHaveBeenCalledTimes(1);
  });

  it('fails every attempt when nobody handles recovery', async () => {
    const failed = vi.fn();
    manager.on('recoveryFailed', failed);
    await manager.recordFailure('persistence', new Error('disk full'));
    expect(failed).toHaveBeenCalledTimes(1);
  });

  it('runs one recovery per service at a time', async () => {
    let attempts = 0;
    manager.on('attemptReconnection', (_service: RecoverableService, callback: (success: boolean) => void) => {
      attempts++;
      callback(true);
    });

    await Promise.all([
      manager.recordFailure('irc', new Error('first')),
      manager.recordFailure('irc', new Error('second')),
    ]);
    expect(attempts).toBe(1);
  });

  it('trips the circuit breaker after repeated failures and can be reset', async () => {
    const idle = new RecoveryManager({ circuitBreakerThreshold: 2 });
    // a destroyed manager still tracks health but starts no recovery
    idle.destroy();
    const tripped = vi.fn();
    idle.on('circuitBreakerTripped', tripped);

    await idle.recordFailure('irc', new Error('one'));
    await idle.recordFailure('irc', new Error('two'));

    expect(tripped).toHaveBeenCalledWith('irc', expect.objectContaining({ consecutiveFailures: 2 }));
    expect(idle.isServiceAvailable('irc')).toBe(false);

    idle.resetCircuitBreaker('irc');
    expect(idle.isServiceAvailable('irc')).toBe(true);
  });

  it('backs off exponentially up to maxDelay', () => {
    expect(manager.calculateDelay(1)).toBe(1);
    expect(manager.calculateDelay(2)).toBe(2);
    expect(manager.calculateDelay(3)).toBe(4);
    expect(manager.calculateDelay(6)).toBe(4);
  });
});
