/**
 * The verification loop.
 *
 * Drives a candidate stream through a verifier, skipping candidates the ledger
 * already holds and appending every accounted outcome, until a password is
 * found, the stream runs out, or the run is cancelled.
 *
 * @packageDocumentation
 */

import type { FileHandle } from 'node:fs/promises';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { estimateSearchSpace } from '../generation/estimate.js';
import { createCandidateStream } from '../generation/stream.js';
import type { GenerationSpec } from '../generation/types.js';
import { contains, documentIdentity } from '../ledger/identity.js';
import { LedgerError, type LedgerStore, type LedgerWriter } from '../ledger/types.js';
import { Logger } from '../utils/logger.js';
import { safeOpen, safeStat } from '../utils/safe-fs.js';
import {
  unexpectedFailure,
  type DocumentHandle,
  type DocumentVerifier,
  type EncryptionCheck,
  type VerificationOutcome,
} from '../verifier/types.js';
import { MetricsTracker } from './metrics.js';
import { transition } from './transitions.js';
import {
  FatalInputError,
  type ExhaustedReason,
  type RecoveryResult,
  type RecoveryState,
  type RunMetrics,
} from './types.js';

/** Attempts between progress reports. */
export const DEFAULT_PROGRESS_INTERVAL = 1000;

/**
 * Candidates pulled from the stream, repeats dropped by the dedup filter
 * included, between yields to the event loop. Ledger skips do not await, so
 * abort handlers only run at these yields during a long resume.
 */
export const EVENT_LOOP_YIELD_INTERVAL = 1024;

/**
 * Options for {@link runRecovery}.
 */
export interface RecoveryOptions {
  /** Path to the encrypted document. */
  documentPath: string;
  spec: GenerationSpec;
  verifier: DocumentVerifier;
  store: LedgerStore;
  /** Cancels the run. Checked between candidates and passed to the verifier. */
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
  /** Attempts between `progress` logs and `onProgress` calls. Default 1000. */
  progressInterval?: number | undefined;
  onStateChange?: ((from: RecoveryState, to: RecoveryState) => void) | undefined;
  onProgress?: ((metrics: RunMetrics) => void) | undefined;
  /** Millisecond clock. Default `Date.now`. */
  now?: (() => number) | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ensures the target exists and is a regular file.
 *
 * @throws {FatalInputError} If it is missing, empty or not a file.
 */
export async function assertTargetFile(documentPath: string): Promise<void> {
  if (documentPath.trim() === '') {
    throw new FatalInputError('No target document was provided', 'TARGET_NOT_PROVIDED', documentPath);
  }

  let isFile: boolean;
  try {
    isFile = (await safeStat(documentPath)).isFile();
  } catch (error) {
    throw new FatalInputError(
      `Target document '${documentPath}' was not found: ${errorMessage(error)}`,
      'TARGET_NOT_FOUND',
      documentPath
    );
  }

  if (!isFile) {
    throw new FatalInputError(
      `Target '${documentPath}' is not a regular file`,
      'TARGET_NOT_A_FILE',
      documentPath
    );
  }
}

async function checkEncryption(
  verifier: DocumentVerifier,
  handle: DocumentHandle
): Promise<EncryptionCheck> {
  try {
    return await verifier.isEncrypted(handle);
  } catch (error) {
    return { kind: 'Undetermined', detail: errorMessage(error) };
  }
}

async function verifyCandidate(
  verifier: DocumentVerifier,
  handle: DocumentHandle,
  candidate: string,
  signal: AbortSignal | undefined
): Promise<VerificationOutcome> {
  try {
    return await verifier.verify(handle, candidate, signal);
  } catch (error) {
    return unexpectedFailure(errorMessage(error));
  }
}

/**
 * Runs one recovery attempt against a document.
 *
 * The document handle and the ledger writer are released on every exit path,
 * including thrown errors.
 *
 * @throws {FatalInputError} If the target is unusable; nothing is written.
 * @throws {LedgerError} If the ledger cannot be read or written.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const result = await runRecovery({
 *   documentPath: 'report.xlsx',
 *   spec: createGenerationSpec({ mode: 'templated', bases: ['admin'], suffixes: ['2021'] }),
 *   verifier: new CommandVerifier(),
 *   store: new FileLedgerStore({ directory: '.sesame/ledger' }),
 *   signal: controller.signal,
 * });
 * if (result.state === 'Success') {
 *   console.log(result.password);
 * }
 * ```
 */
export async function runRecovery(options: RecoveryOptions): Promise<RecoveryResult> {
  const { documentPath, spec, verifier, store, signal } = options;
  const logger = options.logger ?? new Logger({ component: 'VerificationLoop' });
  const progressInterval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
  const metrics = new MetricsTracker(options.now ?? Date.now);

  let state: RecoveryState = 'Init';
  let lastAnomaly: string | undefined;

  const moveTo = (to: RecoveryState): void => {
    const from = state;
    state = transition(from, to);
    logger.debug('state_changed', { from, to });
    options.onStateChange?.(from, to);
  };

  await assertTargetFile(documentPath);
  const identity = documentIdentity(documentPath);

  const exhausted = (reason: ExhaustedReason, detail?: string): RecoveryResult => {
    moveTo('Exhausted');
    const result = metrics.snapshot();
    logger.info('run_exhausted', { identity, reason, ...result });
    return { state: 'Exhausted', identity, reason, detail, metrics: result, lastAnomaly };
  };

  const cancelled = (): RecoveryResult => {
    moveTo('Cancelled');
    const result = metrics.snapshot();
    logger.info('run_cancelled', { identity, ...result });
    return { state: 'Cancelled', identity, metrics: result, lastAnomaly };
  };

  let file: FileHandle | undefined;
  let writer: LedgerWriter | undefined;
  let candidates: Iterator<string> | undefined;
  let failed = false;

  try {
    file = await safeOpen(documentPath, 'r');
    const handle: DocumentHandle = { path: documentPath, identity, file };
    const tried = await store.load(identity);
    logger.info('run_started', { identity, mode: spec.mode, ledgerEntries: tried.size });

    moveTo('CheckEncrypted');
    const check = await checkEncryption(verifier, handle);
    if (check.kind === 'NotEncrypted') {
      return exhausted('not_encrypted');
    }
    if (check.kind === 'Undetermined') {
      logger.warn('encryption_undetermined', { identity, detail: check.detail });
      return exhausted('encryption_undetermined', check.detail);
    }
    if (signal?.aborted === true) {
      return cancelled();
    }

    moveTo('Iterating');
    writer = await store.openWriter(identity);
    const stream = createCandidateStream(spec);
    if (stream.deduplicated) {
      logger.info('dedup_memory_bound', {
        identity,
        mode: spec.mode,
        maxEntries: estimateSearchSpace(spec).candidates,
      });
    }
    const iterator = stream[Symbol.iterator]();
    candidates = iterator;
    let pulled = 0;
    let pulledAtLastYield = 0;

    for (;;) {
      if (pulled + stream.droppedCount - pulledAtLastYield >= EVENT_LOOP_YIELD_INTERVAL) {
        pulledAtLastYield = pulled + stream.droppedCount;
        await yieldToEventLoop();
      }
      if (signal?.aborted === true) {
        return cancelled();
      }
      const next = iterator.next();
      if (next.done === true) {
        break;
      }
      pulled++;
      const candidate = next.value;

      if (contains(tried, candidate)) {
        metrics.skipped++;
        continue;
      }

      const outcome = await verifyCandidate(verifier, handle, candidate, signal);

      if (outcome.kind === 'Success') {
        metrics.succeeded++;
        const result = metrics.snapshot();
        logger.info('password_found', { identity, ...result });
        try {
          await store.recordSuccess(identity, candidate);
        } catch (error) {
          logger.error('success_record_failed', {
            identity,
            password: candidate,
            error: errorMessage(error),
          });
          throw new LedgerError(
            `Found the password for '${identity}' but could not record it: ${errorMessage(error)}`,
            'io_error',
            {
              details: `Password: ${candidate}`,
              cause: error instanceof Error ? error : undefined,
            }
          );
        }
        moveTo('Success');
        return { state: 'Success', identity, password: candidate, metrics: result, lastAnomaly };
      }

      if (signal?.aborted === true) {
        logger.debug('in_flight_outcome_discarded', { identity, outcome: outcome.kind });
        return cancelled();
      }

      await writer.append(candidate);

      switch (outcome.kind) {
        case 'WrongPassword':
          metrics.rejected++;
          break;
        case 'UnexpectedFailure':
          metrics.anomalies++;
          lastAnomaly = outcome.detail;
          logger.warn('verification_anomaly', {
            identity,
            attempt: metrics.attempted,
            detail: outcome.detail,
          });
          break;
        default: {
          const unreachable: never = outcome;
          throw new Error(`Unhandled verification outcome: ${JSON.stringify(unreachable)}`);
        }
      }

      if (metrics.attempted % progressInterval === 0) {
        const progress = metrics.snapshot();
        logger.info('progress', { identity, ...progress, dropped: stream.droppedCount });
        options.onProgress?.(progress);
      }
    }

    return exhausted('search_space_exhausted');
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    candidates?.return?.();
    try {
      await writer?.close();
    } catch (error) {
      if (!failed) {
        throw error;
      }
      logger.error('ledger_close_failed', { identity, error: errorMessage(error) });
    } finally {
      await file?.close();
    }
  }
}
