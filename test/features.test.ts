import { describe, expect, it, vi } from 'vitest';
import { CaseRegistry } from '../lib/board/case-registry';
import { RatBoardFeature } from '../lib/board/feature';
import { validateConfig } from '../lib/config/schema';
import { createFeatures, featureTable, parseCommand, type ChatEvent } from '../lib/features';
import { HelpFeature } from '../lib/help';
import { MemoryCaseStore } from './stubs/memory-case-store';

vi.mock('../lib/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const baseConfig = {
  nickname: 'RatBot',
  server: 'irc.example.org',
  channels: ['#fuelrats'],
};

function command(text: string): ChatEvent {
  const parsed = parseCommand(text, ['!']);
  return { channel: '#fuelrats', sender: 'Rat', text, isCommand: parsed !== undefined, command: parsed };
}

describe('parseCommand', () => {
  it('splits the name and arguments', () => {
    expect(parseCommand('!Assign 3  RatOne RatTwo', ['!'])).toEqual({
      name: 'assign',
      args: ['3', 'RatOne', 'RatTwo'],
      rest: '3  RatOne RatTwo',
    });
  });

  it('takes the longest matching prefix', () => {
    expect(parseCommand('!!list', ['!', '!!'])?.name).toBe('list');
  });

  it('returns undefined for plain lines and bare prefixes', () => {
    expect(parseCommand('ratsignal', ['!'])).toBeUndefined();
    expect(parseCommand('!', ['!'])).toBeUndefined();
    expect(parseCommand('! list', ['!'])).toBeUndefined();
  });

  it('handles commands without arguments', () => {
    expect(parseCommand('  !list  ', ['!'])).toEqual({ name: 'list', args: [], rest: '' });
  });
});

describe('createFeatures', () => {
  const registry = new CaseRegistry(new MemoryCaseStore());

  it('builds the features named in enable, once each', () => {
    const config = validateConfig({ ...baseConfig, enable: 'help, rat-board, help' });
    const features = createFeatures(config.enable, { config, registry });
    expect(features.map((feature) => feature.name)).toEqual(['help', 'rat-board']);
    expect(features[1]).toBeInstanceOf(RatBoardFeature);
  });

  it('has a factory for every feature name', () => {
    expect(Object.keys(featureTable).sort()).toEqual(['help', 'rat-board']);
  });
});

describe('HelpFeature', () => {
  const config = validateConfig(baseConfig);
  const registry = new CaseRegistry(new MemoryCaseStore());
  const [help] = createFeatures(['help', 'rat-board'], { config, registry });

  it('lists every enabled command', async () => {
    const lines = await help.handle(command('!help'));
    expect(lines).toEqual([
      'Commands: !help, !list, !case, !open, !assign|go, !unassign|standdown, !grab, !sys, !pc|xb|ps, '
      + '!cr, !note, !ready, !pause, !resume, !success, !close, !purge',
    ]);
  });

  it('describes one command by any of its names', async () => {
    expect(await help.handle(command('!help go'))).toEqual(['!assign|go <case> <rat...> - Assign rats to a case']);
    expect(await help.handle(command('!help XB'))).toEqual(['!pc|xb|ps <case> - Set the platform']);
  });

  it('says when there is no such command', async () => {
    expect(await help.handle(command('!help fly'))).toEqual(['No help for "fly".']);
  });

  it('stays quiet for other lines', async () => {
    expect(await help.handle(command('!list'))).toEqual([]);
    expect(await help.handle(command('ratsignal'))).toEqual([]);
  });

  it('only knows its own command when the board is disabled', async () => {
    const alone: HelpFeature = new HelpFeature(config, () => [alone]);
    expect(await alone.handle(command('!help'))).toEqual(['Commands: !help']);
  });
});
