/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper that standardizes how command failures are reported
 * and turned into exit codes.
 */

import { displayErrorWithSuggestions, errorContextFor, errorMessageFor } from '../errors.js';
import { EXIT_ERROR, type CliCommandResult, type DisplayOptions } from '../types.js';

/**
 * Runs a command handler and resolves to the process exit code.
 *
 * - On success: the result's exit code, after printing its message if any
 * - On error: prints the message with suggestions and resolves to 1
 *
 * @param fn - The function to wrap (sync or async).
 * @param display - Display options for the error report.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions = { colors: true, unicode: true }
): Promise<number> {
  try {
    const result = await fn();
    if (result.message !== undefined) {
      console.log(result.message);
    }
    return result.exitCode;
  } catch (error) {
    displayErrorWithSuggestions(errorMessageFor(error), errorContextFor(error), display);
    return EXIT_ERROR;
  }
}
