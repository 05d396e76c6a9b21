/**
 * CLI types and interfaces for the sesame CLI.
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/** Exit code when the password was found. */
export const EXIT_FOUND = 0;

/** Exit code for generic failures and usage errors. */
export const EXIT_ERROR = 1;

/** Exit code when the search ended without a password. */
export const EXIT_EXHAUSTED = 2;

/** Exit code when the run was interrupted. */
export const EXIT_CANCELLED = 130;

/**
 * Terminal output options.
 */
export interface DisplayOptions {
  /**
   * Whether to use colors in output.
   */
  colors: boolean;

  /**
   * Whether to use Unicode box-drawing characters.
   */
  unicode: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command arguments, with the command name and `--config` removed.
   */
  args: string[];

  /**
   * Resolved configuration (file, then environment, over the defaults).
   */
  config: Config;

  /**
   * Path of the loaded configuration file, if one was read.
   */
  configPath: string | undefined;

  /**
   * Directory relative paths are resolved against.
   */
  cwd: string;

  /**
   * Terminal output options.
   */
  display: DisplayOptions;

  /**
   * Logger for the `cli` component; commands derive child loggers from it.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Process exit code.
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}
