/**
 * Verifier contract between the recovery loop and a document format.
 *
 * @packageDocumentation
 */

import type { FileHandle } from 'node:fs/promises';

/**
 * An opened target document.
 *
 * The file handle is opened read-only by the recovery loop and released when the
 * run ends. Verifiers that shell out to a tool use `path` instead.
 */
export interface DocumentHandle {
  /** Path the document was opened from. */
  readonly path: string;
  /** Ledger key of the document. */
  readonly identity: string;
  /** Read-only handle held for the duration of the run. */
  readonly file: FileHandle;
}

/**
 * Whether a document is encrypted.
 */
export type EncryptionCheck =
  | { readonly kind: 'Encrypted' }
  | { readonly kind: 'NotEncrypted' }
  | { readonly kind: 'Undetermined'; readonly detail: string };

/**
 * Result of trying one candidate password.
 *
 * - `Success`: the candidate opens the document
 * - `WrongPassword`: the document rejected the candidate
 * - `UnexpectedFailure`: anything else; the candidate is treated as tried
 */
export type VerificationOutcome =
  | { readonly kind: 'Success' }
  | { readonly kind: 'WrongPassword' }
  | { readonly kind: 'UnexpectedFailure'; readonly detail: string };

/**
 * Format-specific password check.
 *
 * Implementations must not throw for an ordinary wrong password. A thrown error
 * is treated by the caller as `Undetermined` or `UnexpectedFailure`.
 */
export interface DocumentVerifier {
  isEncrypted(doc: DocumentHandle): Promise<EncryptionCheck>;
  verify(doc: DocumentHandle, candidate: string, signal?: AbortSignal): Promise<VerificationOutcome>;
}

/** Outcome constant for a rejected candidate. */
export const WRONG_PASSWORD: VerificationOutcome = { kind: 'WrongPassword' };

/** Outcome constant for an accepted candidate. */
export const SUCCESS: VerificationOutcome = { kind: 'Success' };

/**
 * Builds an `UnexpectedFailure` outcome.
 */
export function unexpectedFailure(detail: string): VerificationOutcome {
  return { kind: 'UnexpectedFailure', detail };
}
