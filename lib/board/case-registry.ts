import { EventEmitter } from 'events';
import { logger } from '../logger';
import { toError, withTimeout } from '../ts';
import { CaseStateMachine, INITIAL_STATE } from './case-state';
import type { CaseStore } from './case-store';
import {
  CaseNotFoundError,
  DuplicateActiveCaseError,
  PersistenceUnavailableError,
} from './errors';
import { KeyedLock } from './keyed-lock';
import type {
  CaseEvent,
  CaseRef,
  CaseState,
  CloseReason,
  Platform,
  RescueCase,
  SignalDetails,
} from './types';

/**
 * What openCase does when the reporter already has a live case:
 * merge appends the text as a note, reject throws, allow opens another one.
 */
export type DuplicatePolicy = 'merge' | 'reject' | 'allow';

export type StateChangeEvent = Extract<CaseEvent, { type: 'ready' | 'pause' | 'resume' | 'succeed' }>;

export interface CaseRegistryOptions {
  persistTimeout?: number;
  clock?: () => number;
}

export interface OpenCaseOptions {
  policy?: DuplicatePolicy;
  actor?: string;
  details?: SignalDetails;
}

export interface OpenCaseResult {
  id: number;
  created: boolean;
}

export interface CaseAnnotation {
  system?: string;
  platform?: Platform;
  codeRed?: boolean;
  note?: string;
}

interface LiveCase {
  record: RescueCase;
  machine: CaseStateMachine;
}

const INDEX_KEY = 'index';
const caseKey = (id: number) => `case:${id}`;

/**
 * IRC nick comparison under the rfc1459 casemapping most networks use,
 * where []\~ are the upper-case forms of {}|^.
 */
export function normalizeNick(nick: string): string {
  return nick
    .trim()
    .toLowerCase()
    .replace(/\[/g, '{')
    .replace(/\]/g, '}')
    .replace(/\\/g, '|')
    .replace(/~/g, '^');
}

export class CaseRegistry extends EventEmitter {
  private live = new Map<number, LiveCase>();
  private locks = new KeyedLock();
  private store: CaseStore;
  private persistTimeout: number;
  private clock: () => number;
  private outage?: Error;
  private recovering?: Promise<boolean>;
  private inflight = new Set<Promise<void>>();

  constructor(store: CaseStore, options: CaseRegistryOptions = {}) {
    super();
    this.store = store;
    this.persistTimeout = options.persistTimeout ?? 5000;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Repopulate the live mapping from the store. Meant to run once, before
   * the bot starts taking messages.
   */
  async load(): Promise<number> {
    const rows = await withTimeout(this.store.loadAllOpen(), this.persistTimeout, 'loadAllOpen');
    for (const record of rows) {
      if (record.state.status === 'closed') {
        logger.warn(`Skipping stored case #${record.id}: it is already closed`);
        continue;
      }
      if (this.live.has(record.id)) {
        logger.warn(`Skipping stored case #${record.id}: id already loaded`);
        continue;
      }
      this.live.set(record.id, { record, machine: new CaseStateMachine(record.state) });
    }
    logger.info(`Loaded ${this.live.size} open case(s) from storage`);
    return this.live.size;
  }

  get isAvailable(): boolean {
    return this.outage === undefined;
  }

  async openCase(
    reporter: string,
    rawText: string,
    channel: string,
    options: OpenCaseOptions = {},
  ): Promise<OpenCaseResult> {
    const policy = options.policy ?? 'merge';
    const actor = options.actor ?? reporter;
    const details = options.details ?? {};

    return this.locks.run(INDEX_KEY, async () => {
      const existing = policy === 'allow' ? undefined : this.findLive(reporter);
      if (existing && policy === 'reject') {
        throw new DuplicateActiveCaseError(reporter, existing.record.id);
      }
      if (existing) {
        try {
          return await this.mergeSignal(existing.record.id, rawText, details, actor);
        } catch (error) {
          // closed while we waited for its lock; a fresh case is what the reporter needs
          if (!(error instanceof CaseNotFoundError)) throw error;
        }
      }

      const now = this.clock();
      const record: RescueCase = {
        id: this.nextFreeId(),
        reporter,
        client: details.client ?? reporter,
        channel,
        signal: rawText,
        state: INITIAL_STATE,
        responders: [],
        system: details.system,
        platform: details.platform,
        unidentified: details.platform === undefined,
        codeRed: details.codeRed ?? false,
        language: details.language,
        notes: [],
        history: [{ at: now, actor, action: 'open', detail: rawText }],
        createdAt: now,
        updatedAt: now,
      };

      // commands queued against a closed case with this id must run first
      return this.locks.run(caseKey(record.id), async () => {
        await this.persist('openCase', () => this.store.save(record));
        this.live.set(record.id, { record, machine: new CaseStateMachine(record.state) });
        logger.info(`Opened case #${record.id} for ${record.client} (reporter ${reporter}) in ${channel}`);
        this.emit('caseOpened', record);
        return { id: record.id, created: true };
      });
    });
  }

  async assign(caseId: number, responder: string, actor: string = responder): Promise<RescueCase> {
    return this.assignAll(caseId, [responder], actor);
  }

  /**
   * Add several responders in one write: either all of them land or none.
   */
  async assignAll(caseId: number, responders: readonly string[], actor: string): Promise<RescueCase> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const added: string[] = [];
      for (const nick of responders) {
        if ([...record.responders, ...added].some((known) => sameNick(known, nick))) continue;
        added.push(nick);
      }
      if (added.length === 0) return structuredClone(record);

      const roster = [...record.responders, ...added];
      const state = entry.machine.next({ type: 'assign' }, roster.length);
      const next = this.stamp({ ...record, responders: roster, state }, actor, 'assign', added.join(', '));
      return this.commit(entry, next, 'assign');
    });
  }

  async unassign(caseId: number, responder: string, actor: string = responder): Promise<RescueCase> {
    return this.unassignAll(caseId, [responder], actor);
  }

  async unassignAll(caseId: number, responders: readonly string[], actor: string): Promise<RescueCase> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const removed = record.responders.filter((nick) => responders.some((gone) => sameNick(nick, gone)));
      if (removed.length === 0) return structuredClone(record);

      const roster = record.responders.filter((nick) => !removed.includes(nick));
      const state = entry.machine.next({ type: 'unassign' }, roster.length);
      const next = this.stamp({ ...record, responders: roster, state }, actor, 'unassign', removed.join(', '));
      return this.commit(entry, next, 'unassign');
    });
  }

  async updateState(caseId: number, event: StateChangeEvent, actor = 'system'): Promise<CaseState> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const state = entry.machine.next(event, record.responders.length);
      const next = this.stamp({ ...record, state }, actor, event.type);
      if (state.status === 'closed') {
        await this.retire(entry, next, event.type);
      } else {
        await this.commit(entry, next, event.type);
      }
      return state;
    });
  }

  async annotate(caseId: number, annotation: CaseAnnotation, actor = 'system'): Promise<RescueCase> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const next: RescueCase = { ...record };
      const changes: string[] = [];

      if (annotation.system !== undefined) {
        next.system = annotation.system;
        changes.push(`system=${annotation.system}`);
      }
      if (annotation.platform !== undefined) {
        next.platform = annotation.platform;
        next.unidentified = false;
        changes.push(`platform=${annotation.platform}`);
      }
      if (annotation.codeRed !== undefined) {
        next.codeRed = annotation.codeRed;
        changes.push(`codeRed=${annotation.codeRed}`);
      }
      if (annotation.note !== undefined) {
        next.notes = [...record.notes, annotation.note];
        changes.push(`note=${annotation.note}`);
      }
      if (changes.length === 0) return structuredClone(record);

      return this.commit(entry, this.stamp(next, actor, 'annotate', changes.join(', ')), 'annotate');
    });
  }

  async close(caseId: number, reason: CloseReason = 'closed', actor = 'system'): Promise<RescueCase> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const state = entry.machine.next({ type: 'close', reason }, record.responders.length);
      const next = this.stamp({ ...record, state }, actor, 'close', reason);
      await this.retire(entry, next, 'close');
      return structuredClone(next);
    });
  }

  async purge(caseId: number, actor = 'system'): Promise<RescueCase> {
    return this.close(caseId, 'purged', actor);
  }

  /**
   * Make the store match memory again, then accept mutations. Writes that
   * timed out earlier must settle first; stored cases the board does not hold
   * are dropped and every live case is rewritten. Returns false while the
   * store stays down.
   */
  async recover(): Promise<boolean> {
    if (!this.recovering) {
      this.recovering = this.resync().finally(() => {
        this.recovering = undefined;
      });
    }
    return this.recovering;
  }

  private async resync(): Promise<boolean> {
    try {
      await withTimeout(Promise.all(this.inflight), this.persistTimeout, 'pending writes');
      await withTimeout(this.store.ping(), this.persistTimeout, 'ping');
      const stored = await withTimeout(this.store.loadAllOpen(), this.persistTimeout, 'loadAllOpen');
      for (const row of stored) {
        if (this.live.has(row.id)) continue;
        await withTimeout(this.store.remove(row.id), this.persistTimeout, 'remove');
        logger.warn(`Dropped stored case #${row.id}: it is not on the board`);
      }
      for (const entry of this.live.values()) {
        await withTimeout(this.store.save(entry.record), this.persistTimeout, 'resync');
      }
    } catch (error) {
      logger.warn('Case storage is still unavailable:', toError(error).message);
      return false;
    }

    if (this.outage) {
      this.outage = undefined;
      logger.info(`Case storage recovered; resynced ${this.live.size} open case(s)`);
      this.emit('persistenceRestored');
    }
    return true;
  }

  lookup(caseId: number): RescueCase | undefined {
    const entry = this.live.get(caseId);
    return entry ? structuredClone(entry.record) : undefined;
  }

  findByReporter(nick: string): RescueCase | undefined {
    const entry = this.findLive(nick);
    return entry ? structuredClone(entry.record) : undefined;
  }

  /**
   * Accepts `#3`, `3`, or the nick of the reporter or client.
   */
  resolve(ref: CaseRef): RescueCase | undefined {
    if (typeof ref === 'number') return this.lookup(ref);
    const numeric = /^#?(\d+)$/.exec(ref.trim());
    if (numeric) return this.lookup(Number(numeric[1]));
    return this.findByReporter(ref);
  }

  listOpen(): RescueCase[] {
    return Array.from(this.live.values(), (entry) => structuredClone(entry.record))
      .sort((a, b) => a.createdAt - b.createdAt || a.id - b.id);
  }

  get size(): number {
    return this.live.size;
  }

  private findLive(nick: string): LiveCase | undefined {
    const key = normalizeNick(nick);
    let found: LiveCase | undefined;
    for (const entry of this.live.values()) {
      const { record } = entry;
      if (normalizeNick(record.reporter) !== key && normalizeNick(record.client) !== key) continue;
      if (!found || record.createdAt < found.record.createdAt) found = entry;
    }
    return found;
  }

  private async mergeSignal(
    caseId: number,
    rawText: string,
    details: SignalDetails,
    actor: string,
  ): Promise<OpenCaseResult> {
    return this.withCase(caseId, async (entry) => {
      const { record } = entry;
      const next: RescueCase = {
        ...record,
        notes: [...record.notes, rawText],
        system: record.system ?? details.system,
        platform: record.platform ?? details.platform,
        codeRed: record.codeRed || (details.codeRed ?? false),
        language: record.language ?? details.language,
      };
      next.unidentified = next.platform === undefined;
      await this.commit(entry, this.stamp(next, actor, 'resignal', rawText), 'openCase');
      logger.debug(`Merged repeated signal from ${actor} into case #${caseId}`);
      return { id: caseId, created: false };
    });
  }

  private async withCase<T>(caseId: number, task: (entry: LiveCase) => Promise<T>): Promise<T> {
    return this.locks.run(caseKey(caseId), async () => {
      const entry = this.live.get(caseId);
      if (!entry) throw new CaseNotFoundError(caseId);
      return task(entry);
    });
  }

  private async commit(entry: LiveCase, next: RescueCase, operation: string): Promise<RescueCase> {
    await this.persist(operation, () => this.store.save(next));
    entry.machine.commit(next.state);
    entry.record = next;
    this.emit('caseUpdated', next);
    return structuredClone(next);
  }

  private async retire(entry: LiveCase, next: RescueCase, operation: string): Promise<void> {
    await this.persist(operation, () => this.store.archive(next));
    entry.machine.commit(next.state);
    entry.record = next;
    this.live.delete(next.id);
    logger.info(`Closed case #${next.id} for ${next.client} (${operation})`);
    this.emit('caseClosed', next);
  }

  /**
   * Write-ahead: nothing reaches the live mapping until this resolves. The
   * first failure flips the registry into its outage mode; while in it, each
   * write first tries recover() and is refused if the store is still down.
   */
  private async persist(operation: string, write: () => Promise<void>): Promise<void> {
    if (this.outage && !(await this.recover())) {
      throw new PersistenceUnavailableError(operation, this.outage);
    }

    const pending = write();
    const settled: Promise<void> = pending
      .catch(() => undefined)
      .finally(() => this.inflight.delete(settled));
    this.inflight.add(settled);

    try {
      await withTimeout(pending, this.persistTimeout, `${operation} write`);
    } catch (error) {
      const cause = toError(error);
      if (!this.outage) {
        this.outage = cause;
        logger.error(`Case storage failed during ${operation}; refusing board changes until it recovers:`, cause);
        this.emit('persistenceDown', cause);
      }
      throw new PersistenceUnavailableError(operation, cause);
    }
  }

  private stamp(record: RescueCase, actor: string, action: string, detail?: string): RescueCase {
    const at = this.clock();
    return {
      ...record,
      history: [...record.history, { at, actor, action, detail }],
      updatedAt: at,
    };
  }

  private nextFreeId(): number {
    let id = 0;
    while (this.live.has(id)) id++;
    return id;
  }
}

function sameNick(a: string, b: string): boolean {
  return normalizeNick(a) === normalizeNick(b);
}
