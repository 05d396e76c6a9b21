/**
 * Checkpoint ledger types.
 *
 * @packageDocumentation
 */

/**
 * Key under which a document's ledger is stored: the document's base name.
 *
 * Two different files that share a name share a ledger.
 */
export type DocumentIdentity = string;

/**
 * File locations for one document identity.
 */
export interface LedgerPaths {
  /** Newline-delimited list of candidates already tried. */
  readonly checked: string;
  /** At most one line: the discovered password. */
  readonly success: string;
}

/**
 * Exclusive append handle for one run.
 */
export interface LedgerWriter {
  readonly identity: DocumentIdentity;
  /** Number of candidates appended through this writer. */
  readonly appendedCount: number;
  /**
   * Records one tried candidate. Resolves once the line has been handed to the OS.
   */
  append(candidate: string): Promise<void>;
  /**
   * Flushes and releases the handle. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Summary of a document's ledger, for status reporting.
 */
export interface LedgerStats {
  readonly identity: DocumentIdentity;
  readonly paths: LedgerPaths;
  readonly checkedCount: number;
  /** The recorded password, when a success record exists. */
  readonly password: string | undefined;
}

/**
 * Durable per-document record of tried candidates and of the found password.
 */
export interface LedgerStore {
  /**
   * Reads every candidate recorded for the document. Returns an empty set,
   * after creating the storage location, when there is no ledger yet.
   */
  load(identity: DocumentIdentity): Promise<ReadonlySet<string>>;
  /**
   * Opens the run's exclusive append handle.
   */
  openWriter(identity: DocumentIdentity): Promise<LedgerWriter>;
  /**
   * Writes the success record.
   */
  recordSuccess(identity: DocumentIdentity, password: string): Promise<void>;
  /**
   * Reads the success record, if one exists.
   */
  readSuccess(identity: DocumentIdentity): Promise<string | undefined>;
  /**
   * Summarizes the document's ledger.
   */
  stats(identity: DocumentIdentity): Promise<LedgerStats>;
}

/**
 * Error type for ledger operations.
 */
export type LedgerErrorType = 'io_error' | 'format_error' | 'writer_busy' | 'writer_closed';

/**
 * Error class for ledger storage failures.
 */
export class LedgerError extends Error {
  /** The type of ledger error. */
  public readonly errorType: LedgerErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new LedgerError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of ledger error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: LedgerErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'LedgerError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}
