/**
 * Argument parsing and wiring shared by the run, status and estimate commands.
 */

import * as path from 'node:path';
import type { PathChecker } from '../../config/index.js';
import type { Config, SearchConfig } from '../../config/types.js';
import {
  GENERATION_MODES,
  createGenerationSpec,
  type GenerationMode,
  type GenerationSpec,
} from '../../generation/index.js';
import { FileLedgerStore } from '../../ledger/index.js';
import { safeStatSync } from '../../utils/safe-fs.js';
import { CliUsageError } from '../errors.js';
import type { CliContext } from '../types.js';

/**
 * Flags a command accepts besides its positionals.
 */
export interface AcceptedFlags {
  /** `--mode` and `--max-length`. */
  search?: boolean;
  /** `--force`. */
  force?: boolean;
}

/**
 * Parsed command arguments.
 */
export interface ParsedCommandArgs {
  positionals: string[];
  /** Search settings given as flags; the highest-precedence configuration layer. */
  search: Partial<SearchConfig>;
  force: boolean;
}

function isGenerationMode(value: string): value is GenerationMode {
  return GENERATION_MODES.some((mode) => mode === value);
}

function parseMode(value: string): GenerationMode {
  if (!isGenerationMode(value)) {
    const expected = GENERATION_MODES.map((m) => `'${m}'`).join(', ');
    throw new CliUsageError(`Invalid value for --mode: expected one of ${expected}, got '${value}'`);
  }
  return value;
}

function parseMaxLength(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`Invalid value for --max-length: expected an integer, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parses positionals and the flags a command accepts.
 *
 * Values may be given as `--flag value` or `--flag=value`.
 *
 * @param args - Command arguments.
 * @param accepted - Flags the command accepts.
 * @throws CliUsageError for unknown options and missing or malformed values.
 */
export function parseCommandArgs(
  args: readonly string[],
  accepted: AcceptedFlags = {}
): ParsedCommandArgs {
  const positionals: string[] = [];
  const search: Partial<SearchConfig> = {};
  let force = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const equals = arg.indexOf('=');
    const name = equals === -1 ? arg : arg.slice(0, equals);
    const takeValue = (): string => {
      if (equals !== -1) {
        return arg.slice(equals + 1);
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`${name} requires a value`);
      }
      i++;
      return next;
    };

    if (accepted.search === true && name === '--mode') {
      search.mode = parseMode(takeValue());
    } else if (accepted.search === true && name === '--max-length') {
      search.max_length = parseMaxLength(takeValue());
    } else if (accepted.force === true && arg === '--force') {
      force = true;
    } else {
      throw new CliUsageError(`Unknown option: ${name}`);
    }
  }

  return { positionals, search, force };
}

/**
 * Builds the generation spec from the `[search]` section.
 *
 * @throws GenerationSpecError if the section is not a valid spec.
 */
export function buildGenerationSpec(search: SearchConfig): GenerationSpec {
  return createGenerationSpec({
    mode: search.mode,
    bases: search.bases,
    prefixes: search.prefixes,
    suffixes: search.suffixes,
    maxLength: search.max_length,
    charset: search.charset,
    dedup: search.dedup,
  });
}

/**
 * Creates the ledger store for the configured directory, relative to the working directory.
 */
export function createLedgerStore(context: CliContext, config: Config): FileLedgerStore {
  return new FileLedgerStore({
    directory: path.resolve(context.cwd, config.paths.ledger),
    fsync: config.ledger.fsync,
    logger: context.logger.child('LedgerStore'),
  });
}

/**
 * Path checker for config validation, resolving relative paths against the
 * working directory. A path that cannot be stat'ed counts as missing.
 */
export function createPathChecker(cwd: string): PathChecker {
  return (target) => {
    try {
      return { exists: true, isDirectory: safeStatSync(path.resolve(cwd, target)).isDirectory() };
    } catch {
      return { exists: false };
    }
  };
}
