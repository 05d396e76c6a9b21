/**
 * In-process verifier for tests and dry runs.
 *
 * @packageDocumentation
 */

import {
  SUCCESS,
  WRONG_PASSWORD,
  type DocumentHandle,
  type DocumentVerifier,
  type EncryptionCheck,
  type VerificationOutcome,
} from './types.js';

/**
 * Decides the outcome for one candidate.
 */
export type OutcomeFunction = (
  candidate: string,
  signal: AbortSignal | undefined
) => VerificationOutcome | Promise<VerificationOutcome>;

/**
 * Options for {@link FakeVerifier}.
 */
export interface FakeVerifierOptions {
  /** The password that succeeds. Ignored when `outcome` is given. */
  password?: string | undefined;
  /** Custom outcome per candidate. */
  outcome?: OutcomeFunction | undefined;
  /** Encryption state reported by `isEncrypted`. Default: encrypted. */
  encryption?: EncryptionCheck | undefined;
}

/**
 * Verifier that compares candidates against a known password and records
 * every call.
 *
 * @example
 * ```typescript
 * const verifier = new FakeVerifier({ password: 'Abc1' });
 * await runRecovery({ documentPath, spec, verifier, store });
 * verifier.attempts; // candidates in the order they were verified
 * ```
 */
export class FakeVerifier implements DocumentVerifier {
  /** Candidates passed to `verify`, in call order. */
  readonly attempts: string[] = [];
  /** Number of `isEncrypted` calls. */
  checkCount = 0;

  private readonly outcome: OutcomeFunction;
  private readonly encryption: EncryptionCheck;

  constructor(options: FakeVerifierOptions = {}) {
    const { password } = options;
    this.outcome =
      options.outcome ??
      ((candidate): VerificationOutcome => (candidate === password ? SUCCESS : WRONG_PASSWORD));
    this.encryption = options.encryption ?? { kind: 'Encrypted' };
  }

  isEncrypted(_doc: DocumentHandle): Promise<EncryptionCheck> {
    this.checkCount++;
    return Promise.resolve(this.encryption);
  }

  async verify(
    _doc: DocumentHandle,
    candidate: string,
    signal?: AbortSignal
  ): Promise<VerificationOutcome> {
    this.attempts.push(candidate);
    return this.outcome(candidate, signal);
  }
}
