/**
 * Types for the verification loop.
 *
 * @packageDocumentation
 */

/**
 * States of a recovery run.
 *
 * `Success`, `Exhausted` and `Cancelled` are terminal.
 */
export type RecoveryState =
  | 'Init'
  | 'CheckEncrypted'
  | 'Iterating'
  | 'Success'
  | 'Exhausted'
  | 'Cancelled';

/** All recovery states in lifecycle order. */
export const RECOVERY_STATES: readonly RecoveryState[] = [
  'Init',
  'CheckEncrypted',
  'Iterating',
  'Success',
  'Exhausted',
  'Cancelled',
] as const;

/** Terminal recovery states. */
export type TerminalState = Extract<RecoveryState, 'Success' | 'Exhausted' | 'Cancelled'>;

/**
 * Why a run ended without a password.
 */
export type ExhaustedReason = 'search_space_exhausted' | 'not_encrypted' | 'encryption_undetermined';

/**
 * Counters of a run.
 *
 * `attempted` counts verifier outcomes that were accounted for: rejections,
 * anomalies and the success. An outcome discarded on cancellation is not
 * counted.
 */
export interface RunMetrics {
  readonly attempted: number;
  readonly rejected: number;
  readonly anomalies: number;
  /** Candidates found in the ledger and not re-verified. */
  readonly skipped: number;
  readonly elapsedMs: number;
  /** Attempts per second; undefined until the run has lasted long enough to measure. */
  readonly ratePerSecond: number | undefined;
}

interface RecoveryResultBase {
  /** Ledger key of the document. */
  readonly identity: string;
  readonly metrics: RunMetrics;
  /** Detail of the most recent `UnexpectedFailure`, if any. */
  readonly lastAnomaly: string | undefined;
}

/**
 * Outcome of {@link runRecovery}.
 */
export type RecoveryResult =
  | (RecoveryResultBase & { readonly state: 'Success'; readonly password: string })
  | (RecoveryResultBase & {
      readonly state: 'Exhausted';
      readonly reason: ExhaustedReason;
      /** Explanation for `encryption_undetermined`. */
      readonly detail: string | undefined;
    })
  | (RecoveryResultBase & { readonly state: 'Cancelled' });

/**
 * Error codes for unusable targets.
 */
export type FatalInputErrorCode = 'TARGET_NOT_PROVIDED' | 'TARGET_NOT_FOUND' | 'TARGET_NOT_A_FILE';

/**
 * Raised before any generation when the target document cannot be used.
 * Nothing has been written when it is thrown.
 */
export class FatalInputError extends Error {
  /** Machine-readable error code. */
  public readonly code: FatalInputErrorCode;
  /** The offending path. */
  public readonly path: string;

  /**
   * Creates a new FatalInputError.
   *
   * @param message - Human-readable error message.
   * @param code - Error code.
   * @param path - The offending path.
   */
  constructor(message: string, code: FatalInputErrorCode, path: string) {
    super(message);
    this.name = 'FatalInputError';
    this.code = code;
    this.path = path;
  }
}
