import irc from 'irc-upd';
import { logger } from './logger';
import { PersistenceService } from './persistence';
import { resolveDatabasePath } from './config/database';
import { CaseRegistry } from './board/case-registry';
import { RateLimiter } from './rate-limiter';
import { RecoveryManager, type RecoverableService } from './recovery-manager';
import { createFeatures, parseCommand, type ChatEvent, type ChatFeature } from './features';
import type { BotConfig } from './config/schema';
import { toError } from './ts';

const REGISTRATION_TIMEOUT = 30000;

function isChannelName(target: string): boolean {
  return target.startsWith('#') || target.startsWith('&');
}

/**
 * The IRC side of ratbot. Owns the connection, the case store and registry,
 * and the enabled features; everything it hears in its channels is handed to
 * the features and their answers are said back.
 */
class Bot {
  readonly config: BotConfig;
  server: string;
  nickname: string;
  channels: string[];
  prefixes: string[];

  ircClient?: irc.Client;

  persistence: PersistenceService;
  registry: CaseRegistry;
  features: ChatFeature[];
  rateLimiter: RateLimiter;
  recoveryManager: RecoveryManager;

  private ircConnected = false;
  private recoveryRetries = new Map<RecoverableService, NodeJS.Timeout>();

  constructor(config: BotConfig) {
    this.config = config;
    this.server = config.server;
    this.nickname = config.nickname;
    this.channels = config.channels.map((channel) => channel.toLowerCase());
    this.prefixes = config.help_prefix ? [config.prefix, config.help_prefix] : [config.prefix];

    this.persistence = new PersistenceService(resolveDatabasePath(config.database, config.workdir));
    this.registry = new CaseRegistry(this.persistence, {
      persistTimeout: config.ratboard.persistTimeout,
    });
    this.features = createFeatures(config.enable, { config, registry: this.registry });
    this.rateLimiter = new RateLimiter(config.rateLimiting);
    this.recoveryManager = new RecoveryManager(config.recovery);
    this.setupRecoveryHandlers();

    logger.info(`Enabled features: ${this.features.map((feature) => feature.name).join(', ') || '(none)'}`);
  }

  async connect(): Promise<void> {
    logger.debug('Opening case storage and connecting to IRC');

    await this.persistence.initialize();
    await this.registry.load();

    const client = this.createClient();
    this.ircClient = client;
    this.attachIRCListeners(client);

    logger.info(`Connecting to IRC server: ${this.server}`);
    client.connect(0, () => {
      logger.info(`Connected and registered to IRC server: ${this.server}`);
    });
  }

  async disconnect(): Promise<void> {
    for (const timer of this.recoveryRetries.values()) {
      clearTimeout(timer);
    }
    this.recoveryRetries.clear();
    this.recoveryManager.destroy();
    this.ircConnected = false;
    if (this.ircClient) {
      this.ircClient.disconnect('Shutting down');
      this.ircClient.removeAllListeners();
    }
    await this.persistence.close();
  }

  isIRCConnected(): boolean {
    return this.ircConnected;
  }

  /**
   * Route one channel line through the enabled features. Returns the lines
   * to say back; one feature failing does not silence the others.
   */
  async handleMessage(channel: string, sender: string, text: string): Promise<string[]> {
    const command = parseCommand(text, this.prefixes);
    const event: ChatEvent = { channel, sender, text, isCommand: command !== undefined, command };

    if (command) {
      if (this.rateLimiter.isBlocked(sender)) {
        logger.debug(`Ignoring command from rate limited ${sender}`);
        return [];
      }
      const refusal = this.rateLimiter.checkCommand(sender, text);
      if (refusal) return [refusal];
    }

    const lines: string[] = [];
    for (const feature of this.features) {
      try {
        lines.push(...await feature.handle(event));
      } catch (error) {
        logger.error(`Feature ${feature.name} failed on a message from ${sender} in ${channel}:`, error);
      }
    }
    return lines;
  }

  sayAll(text: string): void {
    for (const channel of this.channels) {
      this.say(channel, [text]);
    }
  }

  private say(target: string, lines: string[]): void {
    if (!this.ircClient || !this.ircConnected) {
      if (lines.length > 0) {
        logger.warn(`Not connected to IRC, dropping ${lines.length} line(s) for ${target}`);
      }
      return;
    }
    for (const line of lines) {
      this.ircClient.say(target, line);
    }
  }

  private createClient(): irc.Client {
    const { sasl } = this.config;
    const ircOptions: irc.ClientOptions = {
      // Spread config first so the settings below win
      ...this.config.ircOptions,
      userName: sasl?.username ?? this.nickname,
      realName: this.nickname,
      password: sasl?.password ?? this.config.password,
      sasl: sasl !== undefined,
      port: this.config.port,
      secure: this.config.secure ?? false,
      channels: this.channels,
      floodProtection: true,
      floodProtectionDelay: 500,
      retryCount: 0, // RecoveryManager owns reconnection
      autoRenick: true,
      autoConnect: false,
    };

    if (ircOptions.encoding === undefined) {
      if (irc.canConvertEncoding()) {
        ircOptions.encoding = 'utf-8';
      } else {
        logger.warn('Cannot convert message encoding; non-ASCII text may arrive corrupted.');
      }
    }

    return new irc.Client(this.server, this.nickname, ircOptions);
  }

  private setupRecoveryHandlers(): void {
    this.recoveryManager.on('attemptReconnection', (service: RecoverableService, callback: (success: boolean) => void) => {
      const attempt = service === 'persistence' ? this.registry.recover() : this.reconnectIRC();
      attempt.then(callback, (error: unknown) => {
        logger.error(`Reconnection attempt failed for ${service}:`, error);
        callback(false);
      });
    });

    this.recoveryManager.on('recoveryFailed', (service: RecoverableService, error: Error) => {
      logger.error(`Recovery failed for ${service}: ${error.message}`);
      if (service === 'persistence') {
        this.sayAll('Case storage is still down. Keep the board by hand.');
      }
      this.scheduleRecoveryRetry(service, error);
    });

    this.recoveryManager.on('circuitBreakerTripped', (service: RecoverableService) => {
      logger.error(`Circuit breaker tripped for ${service}`);
    });

    this.registry.on('persistenceDown', (error: Error) => {
      this.sayAll('Case storage is unavailable: board changes are refused until it recovers.');
      this.recoveryManager.recordFailure('persistence', error).catch((recoveryError: unknown) => {
        logger.error('Persistence recovery crashed:', recoveryError);
      });
    });

    this.registry.on('persistenceRestored', () => {
      this.cancelRecoveryRetry('persistence');
      this.recoveryManager.recordSuccess('persistence');
      this.sayAll('Case storage is back; the board accepts changes again.');
    });
  }

  /**
   * Start another recovery cycle once the circuit breaker timeout has passed.
   * Skipped if the service came back on its own in the meantime.
   */
  private scheduleRecoveryRetry(service: RecoverableService, error: Error): void {
    this.cancelRecoveryRetry(service);
    const delay = this.config.recovery.circuitBreakerTimeout;
    logger.warn(`Retrying ${service} recovery in ${Math.round(delay / 1000)}s`);

    const timer = setTimeout(() => {
      this.recoveryRetries.delete(service);
      const healthy = service === 'persistence' ? this.registry.isAvailable : this.ircConnected;
      if (healthy) return;

      this.recoveryManager.resetCircuitBreaker(service);
      this.recoveryManager.recordFailure(service, error).catch((recoveryError: unknown) => {
        logger.error(`Retried ${service} recovery crashed:`, recoveryError);
      });
    }, delay);
    this.recoveryRetries.set(service, timer);
  }

  private cancelRecoveryRetry(service: RecoverableService): void {
    const timer = this.recoveryRetries.get(service);
    if (timer) {
      clearTimeout(timer);
      this.recoveryRetries.delete(service);
    }
  }

  private reportIRCFailure(error: Error): void {
    this.ircConnected = false;
    this.recoveryManager.recordFailure('irc', error).catch((recoveryError: unknown) => {
      logger.error('IRC recovery crashed:', recoveryError);
    });
  }

  private async reconnectIRC(): Promise<boolean> {
    logger.info('Reconnecting IRC client...');
    const previous = this.ircClient;
    if (previous) {
      previous.removeAllListeners();
      previous.disconnect('Reconnecting');
    }

    const client = this.createClient();
    this.ircClient = client;

    const registered = new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`IRC registration timed out after ${REGISTRATION_TIMEOUT / 1000}s`));
      }, REGISTRATION_TIMEOUT);
      client.once('registered', () => {
        clearTimeout(timeout);
        resolve();
      });
      client.once('error', (error: unknown) => {
        clearTimeout(timeout);
        reject(toError(error));
      });
    });

    this.attachIRCListeners(client);
    client.connect(0);

    try {
      await registered;
    } catch (error) {
      logger.error('IRC reconnection failed:', error);
      return false;
    }
    logger.info(`IRC reconnection successful to ${this.server}`);
    return true;
  }

  private attachIRCListeners(client: irc.Client): void {
    client.on('registered', () => {
      logger.info('Connected and registered to IRC');
      this.ircConnected = true;
      this.cancelRecoveryRetry('irc');
      this.recoveryManager.recordSuccess('irc');

      for (const [command, ...args] of this.config.autoSendCommands) {
        client.send(command, ...args);
      }
    });

    client.on('error', (error: unknown) => {
      logger.error('Received error event from IRC', error);
      this.reportIRCFailure(toError(error));
    });

    client.on('abort', () => {
      logger.warn('IRC connection aborted');
      this.reportIRCFailure(new Error('IRC connection aborted'));
    });

    client.on('netError', (error: unknown) => {
      logger.error('IRC network error:', error);
      this.reportIRCFailure(toError(error));
    });

    client.on('message', (author: string, to: string, text: string) => {
      if (!isChannelName(to) || author === client.nick) return;

      const channel = to.toLowerCase();
      this.handleMessage(channel, author, text)
        .then((lines) => this.say(channel, lines))
        .catch((error: unknown) => {
          logger.error('Error handling IRC message:', error);
        });
    });

    client.on('invite', (channel: string, from: string) => {
      logger.debug('Received invite:', channel, from);
      if (this.channels.includes(channel.toLowerCase())) {
        client.join(channel);
      }
    });
  }
}

/**
 * Build a bot from validated configuration and connect it
 */
export async function createBot(config: BotConfig): Promise<Bot> {
  const bot = new Bot(config);
  await bot.connect();
  return bot;
}

export default Bot;
