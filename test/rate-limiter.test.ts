import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RateLimiter } from '../lib/rate-limiter';

vi.mock('../lib/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('RateLimiter', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    limiter = new RateLimiter({
      burstLimit: 3,
      burstWindow: 1000,
      duplicateThreshold: 3,
      duplicateWindow: 5000,
      cooldownSeconds: 10,
    });
  });

  it('should allow commands within the burst limit', () => {
    expect(limiter.checkCommand('RatOne', '!list', 0)).toBeNull();
    expect(limiter.checkCommand('RatOne', '!case 1', 100)).toBeNull();
    expect(limiter.checkCommand('RatOne', '!case 2', 200)).toBeNull();
  });

  it('should block a nick that exceeds the burst limit', () => {
    limiter.checkCommand('RatOne', '!case 1', 0);
    limiter.checkCommand('RatOne', '!case 2', 100);
    limiter.checkCommand('RatOne', '!case 3', 200);

    expect(limiter.checkCommand('RatOne', '!case 4', 300)).toBe(
      'Slow down, RatOne: burst limit exceeded (3/3 in 1s). Commands ignored for 10 seconds.',
    );
    expect(limiter.isBlocked('ratone', 5000)).toBe(true);
    expect(limiter.checkCommand('RatOne', '!list', 5300)).toBe('RatOne is ignored for 5 more seconds');
  });

  it('should let commands through again once the window slides', () => {
    limiter.checkCommand('RatOne', '!case 1', 0);
    limiter.checkCommand('RatOne', '!case 2', 100);
    limiter.checkCommand('RatOne', '!case 3', 200);

    expect(limiter.checkCommand('RatOne', '!case 4', 1150)).toBeNull();
  });

  it('should block repeated identical commands', () => {
    expect(limiter.checkCommand('RatOne', '!go 1 RatOne', 0)).toBeNull();
    expect(limiter.checkCommand('RatOne', '!go 1 RatOne', 2000)).toBeNull();
    expect(limiter.checkCommand('RatOne', '!go 1 RatOne', 4000)).toBe(
      'Slow down, RatOne: repeated command (3 identical). Commands ignored for 10 seconds.',
    );
  });

  it('should track nicks independently', () => {
    limiter.checkCommand('RatOne', '!case 1', 0);
    limiter.checkCommand('RatOne', '!case 2', 0);
    limiter.checkCommand('RatOne', '!case 3', 0);
    expect(limiter.checkCommand('RatOne', '!case 4', 0)).not.toBeNull();

    expect(limiter.checkCommand('RatTwo', '!case 1', 0)).toBeNull();
    expect(limiter.getStats(0)).toEqual({ trackedNicks: 2, blockedNicks: 1 });
  });

  it('should treat nicks that differ only in rfc1459 case as one nick', () => {
    limiter.checkCommand('[Rat]', '!case 1', 0);
    limiter.checkCommand('{rat}', '!case 2', 100);
    limiter.checkCommand('[RAT]', '!case 3', 200);

    expect(limiter.checkCommand('{Rat}', '!case 4', 300)).toBe(
      'Slow down, [Rat]: burst limit exceeded (3/3 in 1s). Commands ignored for 10 seconds.',
    );
    expect(limiter.isBlocked('{RAT}', 300)).toBe(true);
    expect(limiter.unblock('{rat}')).toBe(true);
    expect(limiter.getStats(300)).toEqual({ trackedNicks: 1, blockedNicks: 0 });
  });

  it('should lift a cooldown by hand', () => {
    limiter.checkCommand('RatOne', '!case 1', 0);
    limiter.checkCommand('RatOne', '!case 2', 0);
    limiter.checkCommand('RatOne', '!case 3', 0);
    limiter.checkCommand('RatOne', '!case 4', 0);

    expect(limiter.unblock('RATONE')).toBe(true);
    expect(limiter.isBlocked('RatOne', 0)).toBe(false);
    expect(limiter.unblock('Nobody')).toBe(false);
  });

  it('should allow everything when disabled', () => {
    const disabled = new RateLimiter({ enabled: false, burstLimit: 1 });
    expect(disabled.checkCommand('RatOne', '!list', 0)).toBeNull();
    expect(disabled.checkCommand('RatOne', '!list', 0)).toBeNull();
    expect(disabled.isBlocked('RatOne', 0)).toBe(false);
  });
});
