/**
 * Allowed state transitions of a recovery run.
 *
 * @packageDocumentation
 */

import type { RecoveryState, TerminalState } from './types.js';

/**
 * Allowed successors of each state. Terminal states have none.
 */
export const RECOVERY_TRANSITIONS: ReadonlyMap<RecoveryState, readonly RecoveryState[]> = new Map<
  RecoveryState,
  readonly RecoveryState[]
>([
  ['Init', ['CheckEncrypted']],
  ['CheckEncrypted', ['Iterating', 'Exhausted', 'Cancelled']],
  ['Iterating', ['Success', 'Exhausted', 'Cancelled']],
  ['Success', []],
  ['Exhausted', []],
  ['Cancelled', []],
]);

/**
 * Error thrown for a transition not listed in {@link RECOVERY_TRANSITIONS}.
 */
export class RecoveryTransitionError extends Error {
  public readonly from: RecoveryState;
  public readonly to: RecoveryState;

  constructor(from: RecoveryState, to: RecoveryState) {
    super(`Invalid recovery transition: ${from} -> ${to}`);
    this.name = 'RecoveryTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Checks whether `from -> to` is allowed.
 */
export function isValidTransition(from: RecoveryState, to: RecoveryState): boolean {
  return RECOVERY_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * Validates a transition and returns the new state.
 *
 * @throws {RecoveryTransitionError} If the transition is not allowed.
 *
 * @example
 * ```typescript
 * transition('Init', 'CheckEncrypted'); // 'CheckEncrypted'
 * transition('Init', 'Success');        // throws
 * ```
 */
export function transition(from: RecoveryState, to: RecoveryState): RecoveryState {
  if (!isValidTransition(from, to)) {
    throw new RecoveryTransitionError(from, to);
  }
  return to;
}

/**
 * Whether a state ends the run.
 */
export function isTerminalState(state: RecoveryState): state is TerminalState {
  return state === 'Success' || state === 'Exhausted' || state === 'Cancelled';
}
