/**
 * Document verifiers.
 *
 * @packageDocumentation
 */

export { SUCCESS, WRONG_PASSWORD, unexpectedFailure } from './types.js';
export type {
  DocumentHandle,
  DocumentVerifier,
  EncryptionCheck,
  VerificationOutcome,
} from './types.js';

export {
  CommandVerifier,
  DEFAULT_CHECK_ARGS,
  DEFAULT_NOT_ENCRYPTED_EXIT_CODES,
  DEFAULT_VERIFIER_COMMAND,
  DEFAULT_VERIFIER_TIMEOUT_MS,
  DEFAULT_VERIFY_ARGS,
  DEFAULT_WRONG_PASSWORD_PATTERN,
  substituteArgs,
} from './command.js';
export type { ArgumentVariables, CommandVerifierOptions } from './command.js';

export { FakeVerifier } from './fake.js';
export type { FakeVerifierOptions, OutcomeFunction } from './fake.js';
