import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceService } from '../lib/persistence';
import { resolveDatabasePath } from '../lib/config/database';
import type { RescueCase } from '../lib/board/types';

vi.mock('../lib/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function makeCase(overrides: Partial<RescueCase> = {}): RescueCase {
  return {
    id: 0,
    reporter: 'Nova',
    client: 'Nova',
    channel: '#fuelrats',
    signal: 'ratsignal',
    state: { status: 'open' },
    responders: [],
    unidentified: true,
    codeRed: false,
    notes: [],
    history: [{ at: 100, actor: 'Nova', action: 'open', detail: 'ratsignal' }],
    createdAt: 100,
    updatedAt: 100,
    ...overrides,
  };
}

describe('PersistenceService', () => {
  let persistence: PersistenceService;

  beforeEach(async () => {
    persistence = new PersistenceService(':memory:');
    await persistence.initialize();
  });

  afterEach(async () => {
    await persistence.close();
  });

  it('saves and reloads open cases', async () => {
    const rescue = makeCase({ system: 'Sol', platform: 'pc', unidentified: false });
    await persistence.save(rescue);
    expect(await persistence.loadAllOpen()).toEqual([rescue]);
  });

  it('replaces the row on every save', async () => {
    await persistence.save(makeCase());
    await persistence.save(makeCase({ responders: ['RatOne'], state: { status: 'assigned' }, updatedAt: 200 }));

    const loaded = await persistence.loadAllOpen();
    expect(loaded).toHaveLength(1);
    expect(loaded[0].responders).toEqual(['RatOne']);
    expect(loaded[0].state).toEqual({ status: 'assigned' });
  });

  it('moves archived cases out of the open set', async () => {
    await persistence.save(makeCase());
    await persistence.save(makeCase({ id: 1, reporter: 'Vega', client: 'Vega' }));
    const closed = makeCase({ state: { status: 'closed', reason: 'success' }, updatedAt: 300 });
    await persistence.archive(closed);

    expect((await persistence.loadAllOpen()).map((rescue) => rescue.id)).toEqual([1]);
    expect(await persistence.getArchived(0)).toEqual(closed);
    expect(await persistence.countArchived()).toBe(1);
  });

  it('returns the latest closure of a reused id', async () => {
    await persistence.archive(makeCase({ state: { status: 'closed', reason: 'failure' } }));
    await persistence.archive(makeCase({ reporter: 'Vega', client: 'Vega', state: { status: 'closed', reason: 'success' } }));

    expect((await persistence.getArchived(0))?.reporter).toBe('Vega');
    expect(await persistence.getArchived(5)).toBeNull();
  });

  it('removes an open row without archiving it', async () => {
    await persistence.save(makeCase());
    await persistence.save(makeCase({ id: 1, reporter: 'Vega', client: 'Vega' }));
    await persistence.remove(0);

    expect((await persistence.loadAllOpen()).map((rescue) => rescue.id)).toEqual([1]);
    expect(await persistence.countArchived()).toBe(0);
  });

  it('answers ping while open and fails after close', async () => {
    await expect(persistence.ping()).resolves.toBeUndefined();
    await persistence.close();
    await expect(persistence.ping()).rejects.toThrow('Database is not initialized');
  });
});

describe('resolveDatabasePath', () => {
  const workdir = path.resolve('/srv/ratbot');

  it('keeps :memory: as is', () => {
    expect(resolveDatabasePath(':memory:', workdir)).toBe(':memory:');
    expect(resolveDatabasePath('sqlite::memory:', workdir)).toBe(':memory:');
  });

  it('resolves relative paths against the workdir', () => {
    expect(resolveDatabasePath('cases.db', workdir)).toBe(path.join(workdir, 'cases.db'));
    expect(resolveDatabasePath('sqlite:data/cases.db', workdir)).toBe(path.join(workdir, 'data', 'cases.db'));
    expect(resolveDatabasePath('sqlite://cases.db', workdir)).toBe(path.join(workdir, 'cases.db'));
  });

  it('keeps absolute paths', () => {
    expect(resolveDatabasePath('file:///var/lib/ratbot.db', workdir)).toBe('/var/lib/ratbot.db');
  });

  it('rejects other database schemes', () => {
    expect(() => resolveDatabasePath('postgres://localhost/ratbot', workdir))
      .toThrow('Unsupported database scheme "postgres:" (expected a sqlite path)');
  });

  it('rejects a scheme with no path', () => {
    expect(() => resolveDatabasePath('sqlite:', workdir)).toThrow('Database connection string has no path');
  });
});
