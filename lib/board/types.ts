export const PLATFORMS = ['pc', 'xb', 'ps'] as const;
export type Platform = typeof PLATFORMS[number];

export const CLOSE_REASONS = ['success', 'failure', 'closed', 'purged', 'timeout'] as const;
export type CloseReason = typeof CLOSE_REASONS[number];

export type ActiveStatus = 'open' | 'assigned' | 'callForJump';

export type CaseState =
  | { status: ActiveStatus }
  | { status: 'paused'; from: ActiveStatus }
  | { status: 'closed'; reason: CloseReason };

export type CaseStatus = CaseState['status'];

export type CaseEvent =
  | { type: 'assign' }
  | { type: 'unassign' }
  | { type: 'ready' }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'succeed' }
  | { type: 'close'; reason: CloseReason };

export type CaseEventType = CaseEvent['type'];

export interface CaseHistoryEntry {
  at: number;
  actor: string;
  action: string;
  detail?: string;
}

/**
 * A tracked rescue request. Values are replaced, never mutated in place:
 * the registry computes the next value, persists it, then swaps it in.
 */
export interface RescueCase {
  id: number;
  /** Chat handle that raised the signal */
  reporter: string;
  /** In-game commander name; the reporter's nick unless the signal names one */
  client: string;
  channel: string;
  signal: string;
  state: CaseState;
  responders: string[];
  system?: string;
  platform?: Platform;
  /** Set while the reporter's platform is unknown */
  unidentified: boolean;
  codeRed: boolean;
  language?: string;
  notes: string[];
  history: CaseHistoryEntry[];
  createdAt: number;
  updatedAt: number;
}

export interface SignalDetails {
  client?: string;
  system?: string;
  platform?: Platform;
  codeRed?: boolean;
  language?: string;
}

export interface SignalMatch {
  text: string;
  reporter: string;
  channel: string;
  timestamp: number;
  details: SignalDetails;
}

export type CaseRef = number | string;
