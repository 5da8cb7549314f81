import type { RescueCase } from './types';

/**
 * Durable home of the board. `save` upserts a live case, `archive` moves a
 * closed one out of the live set, `remove` drops a live row without
 * archiving it, `loadAllOpen` runs at startup and on recovery.
 */
export interface CaseStore {
  save(rescue: RescueCase): Promise<void>;
  archive(rescue: RescueCase): Promise<void>;
  remove(caseId: number): Promise<void>;
  loadAllOpen(): Promise<RescueCase[]>;
  ping(): Promise<void>;
}
