/**
 * Document identity and ledger file naming.
 *
 * @packageDocumentation
 */

import { basename, join } from 'node:path';
import type { DocumentIdentity, LedgerPaths } from './types.js';

/** Suffix of the tried-candidates file. */
export const CHECKED_FILE_SUFFIX = '.checked.txt';

/** Suffix of the success record file. */
export const SUCCESS_FILE_SUFFIX = '.found.txt';

/**
 * Derives the ledger key from a document path.
 *
 * Only the base name is used, so the ledger follows a file that is moved or
 * copied elsewhere under the same name. Distinct files with the same name
 * collide.
 *
 * @param documentPath - Path to the target document.
 * @returns The base name of the path.
 *
 * @example
 * ```typescript
 * documentIdentity('/data/q3/report.xlsx'); // 'report.xlsx'
 * ```
 */
export function documentIdentity(documentPath: string): DocumentIdentity {
  return basename(documentPath);
}

/**
 * Ledger file locations for an identity inside a ledger directory.
 */
export function ledgerPaths(directory: string, identity: DocumentIdentity): LedgerPaths {
  return {
    checked: join(directory, `${identity}${CHECKED_FILE_SUFFIX}`),
    success: join(directory, `${identity}${SUCCESS_FILE_SUFFIX}`),
  };
}

/**
 * O(1) membership test against the set loaded at run start.
 *
 * Candidates appended during the current run are not in the set; the
 * deduplicated candidate stream already keeps them from coming back.
 */
export function contains(loaded: ReadonlySet<string>, candidate: string): boolean {
  return loaded.has(candidate);
}
