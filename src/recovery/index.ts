/**
 * Verification loop module.
 *
 * @packageDocumentation
 */

export { FatalInputError, RECOVERY_STATES } from './types.js';
export type {
  ExhaustedReason,
  FatalInputErrorCode,
  RecoveryResult,
  RecoveryState,
  RunMetrics,
  TerminalState,
} from './types.js';

export {
  RECOVERY_TRANSITIONS,
  RecoveryTransitionError,
  isTerminalState,
  isValidTransition,
  transition,
} from './transitions.js';

export { MIN_RATE_WINDOW_MS, MetricsTracker, computeRate } from './metrics.js';

export {
  DEFAULT_PROGRESS_INTERVAL,
  EVENT_LOOP_YIELD_INTERVAL,
  assertTargetFile,
  runRecovery,
} from './loop.js';
export type { RecoveryOptions } from './loop.js';
