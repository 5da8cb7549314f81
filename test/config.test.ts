import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';
import { validateConfig } from '../lib/config/schema';
import { applyEnvironmentOverrides, readConfigFile } from '../lib/config/load';

vi.mock('../lib/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const minimal = {
  nickname: 'RatBot',
  server: 'irc.example.org',
  channels: ['#fuelrats'],
};

describe('validateConfig', () => {
  it('applies defaults', () => {
    const config = validateConfig(minimal);
    expect(config.prefix).toBe('!');
    expect(config.help_prefix).toBeUndefined();
    expect(config.enable).toEqual(['rat-board', 'help']);
    expect(config.database).toBe('sqlite:ratbot.db');
    expect(config.workdir).toBe('.');
    expect(config.autoSendCommands).toEqual([]);
    expect(config.ratboard).toEqual({
      signal: 'ratsignal',
      caseSensitive: false,
      duplicatePolicy: 'merge',
      admins: [],
      persistTimeout: 5000,
      recentLines: 500,
    });
    expect(config.rateLimiting.burstLimit).toBe(5);
    expect(config.recovery.maxRetries).toBe(5);
  });

  it('accepts enable as a comma separated string', () => {
    expect(validateConfig({ ...minimal, enable: 'help' }).enable).toEqual(['help']);
  });

  it('rejects unknown features', () => {
    expect(() => validateConfig({ ...minimal, enable: ['rat-board', 'quotes'] })).toThrow(ZodError);
  });

  it('accepts sqlite connection strings and rejects other databases', () => {
    expect(validateConfig({ ...minimal, database: ':memory:' }).database).toBe(':memory:');
    expect(validateConfig({ ...minimal, database: 'file:/var/lib/ratbot.db' }).database).toBe('file:/var/lib/ratbot.db');
    expect(validateConfig({ ...minimal, database: 'data/cases.db' }).database).toBe('data/cases.db');
    expect(() => validateConfig({ ...minimal, database: 'postgresql://localhost/ratbot' })).toThrow(ZodError);
  });

  it('rejects a sqlite URL that names no file', () => {
    expect(() => validateConfig({ ...minimal, database: 'sqlite:' }))
      .toThrow('Database connection string has no path');
    expect(() => validateConfig({ ...minimal, database: 'sqlite://' })).toThrow(ZodError);
  });

  it('accepts the system data refresh options', () => {
    const config = validateConfig({ ...minimal, edsm_maxage: 43200, edsm_autorefresh: true });
    expect(config.edsm_maxage).toBe(43200);
    expect(config.edsm_autorefresh).toBe(true);
  });

  it('requires at least one channel', () => {
    expect(() => validateConfig({ ...minimal, channels: [] })).toThrow(ZodError);
  });

  it('keeps extra irc client options', () => {
    const config = validateConfig({ ...minimal, ircOptions: { encoding: 'utf-8', stripColors: true } });
    expect(config.ircOptions).toEqual({ encoding: 'utf-8', stripColors: true });
  });
});

describe('applyEnvironmentOverrides', () => {
  it('overrides secrets and the database from the environment', () => {
    const overridden = applyEnvironmentOverrides(
      { ...minimal, sasl: { username: 'file-user', password: 'file-pass' } },
      {
        IRC_PASSWORD: 'test-secret',
        IRC_SASL_PASSWORD: 'test-sasl-secret',
        RATBOT_DATABASE: ':memory:',
      },
    );
    expect(overridden.password).toBe('test-secret');
    expect(overridden.sasl).toEqual({ username: 'file-user', password: 'test-sasl-secret' });
    expect(overridden.database).toBe(':memory:');
  });

  it('leaves the config alone without overrides', () => {
    const config = { ...minimal };
    expect(applyEnvironmentOverrides(config, {})).toEqual(minimal);
  });

  it('does not modify the object it was given', () => {
    const sasl = { username: 'file-user', password: 'file-pass' };
    applyEnvironmentOverrides({ ...minimal, sasl }, { IRC_SASL_USERNAME: 'env-user' });
    expect(sasl.username).toBe('file-user');
  });
});

describe('readConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ratbot-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads JSON with comments', async () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, [
      '{',
      '  // the bot',
      '  "nickname": "RatBot",',
      '  "server": "irc.example.org", /* main network */',
      '  "channels": ["#fuelrats"]',
      '}',
    ].join('\n'));
    expect(await readConfigFile(file)).toEqual(minimal);
  });

  it('uses the first entry of a multi-bot array', async () => {
    const file = path.join(dir, 'bots.json');
    fs.writeFileSync(file, JSON.stringify([minimal, { ...minimal, nickname: 'Second' }]));
    expect(await readConfigFile(file)).toEqual(minimal);
  });

  it('rejects files that do not hold an object', async () => {
    const file = path.join(dir, 'empty.json');
    fs.writeFileSync(file, '[]');
    await expect(readConfigFile(file)).rejects.toThrow('Config array is empty');

    fs.writeFileSync(file, '"ratbot"');
    await expect(readConfigFile(file)).rejects.toThrow('Expecting an object exported from the config file, got ratbot');
  });
});
