/**
 * File-backed checkpoint ledger.
 *
 * Layout inside the ledger directory, per document identity:
 * - `<identity>.checked.txt`: one tried candidate per line, UTF-8, `\n`-terminated, append-only
 * - `<identity>.found.txt`: the discovered password on a single line, written atomically
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { FileHandle } from 'node:fs/promises';
import { Logger } from '../utils/logger.js';
import {
  safeExists,
  safeMkdir,
  safeOpen,
  safeReadFile,
  safeRename,
  safeUnlink,
  safeWriteFile,
} from '../utils/safe-fs.js';
import { ledgerPaths } from './identity.js';
import {
  LedgerError,
  type DocumentIdentity,
  type LedgerPaths,
  type LedgerStats,
  type LedgerStore,
  type LedgerWriter,
} from './types.js';

/**
 * Result of parsing a ledger file.
 */
export interface ParsedLedger {
  /** Complete, newline-terminated entries. */
  readonly entries: readonly string[];
  /** Trailing text with no terminating newline, left by an interrupted write. */
  readonly tornFragment: string | undefined;
}

/**
 * Options for {@link FileLedgerStore}.
 */
export interface FileLedgerStoreOptions {
  /** Directory holding the ledger files. Created on first use. */
  directory: string;
  /** Call `datasync()` after every append. Default is false. */
  fsync?: boolean | undefined;
  logger?: Logger | undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function assertSingleLine(value: string, what: string): void {
  if (value.includes('\n') || value.includes('\r')) {
    throw new LedgerError(`Cannot record ${what} containing a line break`, 'format_error', {
      details: JSON.stringify(value),
    });
  }
}

/**
 * Splits ledger content into entries.
 *
 * Each `\n` terminates one entry, so an empty line is the empty candidate. A
 * trailing `\r` is dropped from each entry. Text after the last `\n` is a torn
 * write and is not an entry.
 *
 * @param content - Raw file content.
 *
 * @example
 * ```typescript
 * parseLedgerContent('abc\nAbc\nab');
 * // { entries: ['abc', 'Abc'], tornFragment: 'ab' }
 * ```
 */
export function parseLedgerContent(content: string): ParsedLedger {
  if (content === '') {
    return { entries: [], tornFragment: undefined };
  }
  const lines = content.split('\n');
  const last = lines.pop() ?? '';
  return {
    entries: lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line)),
    tornFragment: last === '' ? undefined : last,
  };
}

class FileLedgerWriter implements LedgerWriter {
  private closed = false;
  private appended = 0;

  constructor(
    readonly identity: DocumentIdentity,
    private readonly handle: FileHandle,
    private readonly fsync: boolean,
    private readonly release: () => void
  ) {}

  get appendedCount(): number {
    return this.appended;
  }

  async append(candidate: string): Promise<void> {
    if (this.closed) {
      throw new LedgerError(`Ledger writer for '${this.identity}' is closed`, 'writer_closed');
    }
    assertSingleLine(candidate, 'a candidate');

    try {
      await this.handle.appendFile(`${candidate}\n`, 'utf-8');
      if (this.fsync) {
        await this.handle.datasync();
      }
    } catch (error) {
      throw new LedgerError(
        `Failed to append to ledger for '${this.identity}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error) }
      );
    }
    this.appended++;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.release();
    try {
      await this.handle.datasync();
    } finally {
      await this.handle.close();
    }
  }
}

/**
 * Ledger store that keeps one pair of text files per document identity.
 *
 * @example
 * ```typescript
 * const store = new FileLedgerStore({ directory: '.sesame/ledger' });
 * const tried = await store.load('report.xlsx');
 * const writer = await store.openWriter('report.xlsx');
 * try {
 *   await writer.append('Admin2021');
 * } finally {
 *   await writer.close();
 * }
 * ```
 */
export class FileLedgerStore implements LedgerStore {
  readonly directory: string;
  private readonly fsync: boolean;
  private readonly logger: Logger;
  private readonly openIdentities = new Set<DocumentIdentity>();

  constructor(options: FileLedgerStoreOptions) {
    this.directory = options.directory;
    this.fsync = options.fsync ?? false;
    this.logger = options.logger ?? new Logger({ component: 'LedgerStore' });
  }

  /**
   * File locations for an identity.
   */
  pathsFor(identity: DocumentIdentity): LedgerPaths {
    return ledgerPaths(this.directory, identity);
  }

  async load(identity: DocumentIdentity): Promise<ReadonlySet<string>> {
    await this.ensureDirectory();
    const { checked } = this.pathsFor(identity);
    const parsed = await this.readChecked(checked);

    if (parsed.tornFragment !== undefined) {
      this.logger.warn('ledger_torn_line', {
        identity,
        path: checked,
        fragment: parsed.tornFragment,
        message: 'Last line has no newline; it is not counted and will be removed when the ledger is next written',
      });
    }
    this.logger.debug('ledger_loaded', { identity, entries: parsed.entries.length });

    return new Set(parsed.entries);
  }

  async openWriter(identity: DocumentIdentity): Promise<LedgerWriter> {
    if (this.openIdentities.has(identity)) {
      throw new LedgerError(`Ledger for '${identity}' is already open for writing`, 'writer_busy');
    }
    await this.ensureDirectory();
    const { checked } = this.pathsFor(identity);

    let handle: FileHandle;
    try {
      handle = await safeOpen(checked, 'a+');
    } catch (error) {
      throw new LedgerError(
        `Failed to open ledger '${checked}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error) }
      );
    }

    try {
      await this.truncateTornFragment(handle, identity, checked);
    } catch (error) {
      await handle.close();
      throw new LedgerError(
        `Failed to repair ledger '${checked}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error) }
      );
    }

    this.openIdentities.add(identity);
    return new FileLedgerWriter(identity, handle, this.fsync, () => {
      this.openIdentities.delete(identity);
    });
  }

  async recordSuccess(identity: DocumentIdentity, password: string): Promise<void> {
    assertSingleLine(password, 'a password');
    await this.ensureDirectory();
    const { success } = this.pathsFor(identity);
    const tempPath = join(this.directory, `.${identity}-${randomUUID()}.tmp`);

    try {
      await safeWriteFile(tempPath, `${password}\n`);
      await safeRename(tempPath, success);
    } catch (error) {
      try {
        await safeUnlink(tempPath);
      } catch {
        // The temp file may never have been created.
      }
      throw new LedgerError(
        `Failed to write success record '${success}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error), details: 'Check that the ledger directory is writable' }
      );
    }
    this.logger.info('success_recorded', { identity, path: success });
  }

  async readSuccess(identity: DocumentIdentity): Promise<string | undefined> {
    const { success } = this.pathsFor(identity);
    if (!(await safeExists(success))) {
      return undefined;
    }

    let content: string;
    try {
      content = await safeReadFile(success);
    } catch (error) {
      throw new LedgerError(
        `Failed to read success record '${success}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error) }
      );
    }

    const { entries, tornFragment } = parseLedgerContent(content);
    const lines = tornFragment === undefined ? entries : [...entries, tornFragment];
    const [password, ...extra] = lines;
    if (password === undefined || extra.length > 0) {
      throw new LedgerError(
        `Success record '${success}' must contain exactly one line`,
        'format_error',
        { details: `Found ${String(lines.length)} lines` }
      );
    }
    return password;
  }

  async stats(identity: DocumentIdentity): Promise<LedgerStats> {
    const paths = this.pathsFor(identity);
    const parsed = (await safeExists(paths.checked))
      ? await this.readChecked(paths.checked)
      : { entries: [], tornFragment: undefined };

    return {
      identity,
      paths,
      checkedCount: new Set(parsed.entries).size,
      password: await this.readSuccess(identity),
    };
  }

  private async ensureDirectory(): Promise<void> {
    try {
      await safeMkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new LedgerError(
        `Failed to create ledger directory '${this.directory}': ${toError(error).message}`,
        'io_error',
        { cause: toError(error) }
      );
    }
  }

  private async readChecked(path: string): Promise<ParsedLedger> {
    if (!(await safeExists(path))) {
      return { entries: [], tornFragment: undefined };
    }
    try {
      return parseLedgerContent(await safeReadFile(path));
    } catch (error) {
      throw new LedgerError(`Failed to read ledger '${path}': ${toError(error).message}`, 'io_error', {
        cause: toError(error),
      });
    }
  }

  private async truncateTornFragment(
    handle: FileHandle,
    identity: DocumentIdentity,
    path: string
  ): Promise<void> {
    const content = await handle.readFile();
    if (content.length === 0 || content[content.length - 1] === 0x0a) {
      return;
    }
    const keep = content.lastIndexOf(0x0a) + 1;
    await handle.truncate(keep);
    this.logger.warn('ledger_torn_line_truncated', {
      identity,
      path,
      removedBytes: content.length - keep,
      removed: content.subarray(keep).toString('utf-8'),
      message: 'Removed the last line because it had no newline; re-add it by hand if it was complete',
    });
  }
}
