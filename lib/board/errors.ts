import type { CaseEventType, CaseStatus } from './types';

export type BoardErrorCode =
  | 'DUPLICATE_ACTIVE_CASE'
  | 'CASE_NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'PERSISTENCE_UNAVAILABLE';

/**
 * Conditions a caller can recover from. The chat layer turns each one into a
 * single reply; anything that is not a BoardError is a bug and propagates.
 */
export abstract class BoardError extends Error {
  abstract readonly code: BoardErrorCode;
}

export class DuplicateActiveCaseError extends BoardError {
  readonly code = 'DUPLICATE_ACTIVE_CASE';

  constructor(readonly reporter: string, readonly existingId: number) {
    super(`${reporter} already has an open case (#${existingId})`);
    this.name = 'DuplicateActiveCaseError';
  }
}

export class CaseNotFoundError extends BoardError {
  readonly code = 'CASE_NOT_FOUND';

  constructor(readonly ref: string | number) {
    super(`No open case matches ${typeof ref === 'number' ? `#${ref}` : `"${ref}"`}`);
    this.name = 'CaseNotFoundError';
  }
}

export class InvalidTransitionError extends BoardError {
  readonly code = 'INVALID_TRANSITION';

  constructor(readonly from: CaseStatus, readonly event: CaseEventType) {
    super(`Cannot apply "${event}" to a case in state "${from}"`);
    this.name = 'InvalidTransitionError';
  }
}

export class PersistenceUnavailableError extends BoardError {
  readonly code = 'PERSISTENCE_UNAVAILABLE';

  constructor(readonly operation: string, readonly cause?: Error) {
    super(cause
      ? `Case storage unavailable during ${operation}: ${cause.message}`
      : `Case storage unavailable during ${operation}`);
    this.name = 'PersistenceUnavailableError';
  }
}
