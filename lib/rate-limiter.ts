import { LRUCache } from 'lru-cache';
import { logger } from './logger';
import { normalizeNick } from './board/case-registry';

export interface RateLimitConfig {
  enabled: boolean;

  // Flood protection
  burstLimit: number; // Max commands in burst window
  burstWindow: number; // Burst window in ms

  // Repeated-command detection
  duplicateThreshold: number; // Identical commands that trigger a cooldown
  duplicateWindow: number; // Window in ms to look for duplicates

  cooldownSeconds: number; // How long a nick is ignored after tripping a limit
}

export interface NickActivity {
  nick: string;
  recentCommands: number[]; // Timestamps
  commandHistory: Array<{ text: string; at: number }>;
  blockedUntil: number;
  warnings: number;
}

/**
 * Per-nick limits on bot commands. Plain chat lines, and therefore signals,
 * never pass through here.
 */
export class RateLimiter {
  private config: RateLimitConfig;
  // LRU bound so a channel full of drive-by nicks cannot grow this forever
  private activity: LRUCache<string, NickActivity>;

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = {
      enabled: true,
      burstLimit: 5,
      burstWindow: 10 * 1000,
      duplicateThreshold: 3,
      duplicateWindow: 30 * 1000,
      cooldownSeconds: 30,
      ...config
    };

    this.activity = new LRUCache<string, NickActivity>({
      max: 5000,
      ttl: 1000 * 60 * 60, // 1 hour
      updateAgeOnGet: true,
    });
  }

  /**
   * Returns null if the command may run, or the reason it may not
   */
  checkCommand(nick: string, text: string, now: number = Date.now()): string | null {
    if (!this.config.enabled) return null;

    const key = normalizeNick(nick);
    let user = this.activity.get(key);
    if (!user) {
      user = { nick, recentCommands: [], commandHistory: [], blockedUntil: 0, warnings: 0 };
      this.activity.set(key, user);
    }

    if (now < user.blockedUntil) {
      const remaining = Math.ceil((user.blockedUntil - now) / 1000);
      return `${nick} is ignored for ${remaining} more seconds`;
    }

    user.recentCommands = user.recentCommands.filter(at => at > now - this.config.burstWindow);
    user.commandHistory = user.commandHistory.filter(entry => entry.at > now - this.config.duplicateWindow);

    if (user.recentCommands.length >= this.config.burstLimit) {
      return this.block(user, now, `burst limit exceeded (${user.recentCommands.length}/${this.config.burstLimit} in ${this.config.burstWindow / 1000}s)`);
    }

    const duplicates = user.commandHistory.filter(entry => entry.text === text).length;
    if (duplicates >= this.config.duplicateThreshold - 1) {
      return this.block(user, now, `repeated command (${duplicates + 1} identical)`);
    }

    user.recentCommands.push(now);
    user.commandHistory.push({ text, at: now });
    return null;
  }

  /**
   * True while the nick sits out a cooldown
   */
  isBlocked(nick: string, now: number = Date.now()): boolean {
    if (!this.config.enabled) return false;
    const user = this.activity.get(normalizeNick(nick));
    return user !== undefined && now < user.blockedUntil;
  }

  private block(user: NickActivity, now: number, reason: string): string {
    user.warnings++;
    user.blockedUntil = now + this.config.cooldownSeconds * 1000;
    logger.warn(`Rate limit for ${user.nick}: ${reason} (warning ${user.warnings})`);
    return `Slow down, ${user.nick}: ${reason}. Commands ignored for ${this.config.cooldownSeconds} seconds.`;
  }

  /**
   * Manually lift a cooldown (admin function)
   */
  unblock(nick: string): boolean {
    const user = this.activity.get(normalizeNick(nick));
    if (user && user.blockedUntil > 0) {
      user.blockedUntil = 0;
      logger.info(`${user.nick} manually unblocked`);
      return true;
    }
    return false;
  }

  getStats(now: number = Date.now()): { trackedNicks: number; blockedNicks: number } {
    let blockedNicks = 0;
    for (const user of this.activity.values()) {
      if (now < user.blockedUntil) blockedNicks++;
    }
    return { trackedNicks: this.activity.size, blockedNicks };
  }
}
