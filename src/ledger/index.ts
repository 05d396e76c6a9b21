/**
 * Checkpoint ledger module.
 *
 * Durable record of tried candidates and the discovered password, keyed by
 * document identity.
 *
 * @packageDocumentation
 */

export { LedgerError } from './types.js';
export type {
  DocumentIdentity,
  LedgerErrorType,
  LedgerPaths,
  LedgerStats,
  LedgerStore,
  LedgerWriter,
} from './types.js';

export {
  CHECKED_FILE_SUFFIX,
  SUCCESS_FILE_SUFFIX,
  contains,
  documentIdentity,
  ledgerPaths,
} from './identity.js';

export { FileLedgerStore, parseLedgerContent } from './persistence.js';
export type { FileLedgerStoreOptions, ParsedLedger } from './persistence.js';
