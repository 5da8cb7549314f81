import { InvalidTransitionError } from './errors';
import type { ActiveStatus, CaseEvent, CaseState, CaseStatus } from './types';

export const INITIAL_STATE: CaseState = { status: 'open' };

const PAUSABLE: readonly CaseStatus[] = ['open', 'assigned', 'callForJump'];

function isActive(status: CaseStatus): status is ActiveStatus {
  return PAUSABLE.includes(status);
}

/**
 * Compute the state that follows `event`. `responders` is the size of the
 * responder roster once the event's own roster change has been applied.
 * Throws InvalidTransitionError for every pair not listed here.
 */
export function nextState(state: CaseState, event: CaseEvent, responders: number): CaseState {
  const fail = (): never => {
    throw new InvalidTransitionError(state.status, event.type);
  };

  if (state.status === 'closed') return fail();

  switch (event.type) {
    case 'assign':
      if (state.status === 'open') return { status: 'assigned' };
      return state;

    case 'unassign':
      if (state.status === 'paused') return state;
      if (state.status === 'open') return state;
      return responders === 0 ? { status: 'open' } : state;

    case 'ready':
      return state.status === 'assigned' ? { status: 'callForJump' } : fail();

    case 'succeed':
      return state.status === 'callForJump' ? { status: 'closed', reason: 'success' } : fail();

    case 'close':
      return { status: 'closed', reason: event.reason };

    case 'pause':
      return isActive(state.status) ? { status: 'paused', from: state.status } : fail();

    case 'resume':
      if (state.status !== 'paused') return fail();
      if (responders === 0) return { status: 'open' };
      return state.from === 'callForJump' ? { status: 'callForJump' } : { status: 'assigned' };
  }
}

export function isTerminal(state: CaseState): boolean {
  return state.status === 'closed';
}

export function describeState(state: CaseState): string {
  switch (state.status) {
    case 'open': return 'Open';
    case 'assigned': return 'Assigned';
    case 'callForJump': return 'Call for jump';
    case 'paused': return 'Paused';
    case 'closed': return `Closed (${state.reason})`;
  }
}

/**
 * Lifecycle of one case. The registry asks for the next state, persists it,
 * and only then commits, so a failed write never leaves a half-applied
 * transition behind.
 */
export class CaseStateMachine {
  private current: CaseState;

  constructor(initial: CaseState = INITIAL_STATE) {
    this.current = initial;
  }

  get state(): CaseState {
    return this.current;
  }

  next(event: CaseEvent, responders: number): CaseState {
    return nextState(this.current, event, responders);
  }

  commit(state: CaseState): void {
    if (isTerminal(this.current)) {
      throw new InvalidTransitionError(this.current.status, 'close');
    }
    this.current = state;
  }
}
