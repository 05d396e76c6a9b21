/**
 * Error suggestion system for the sesame CLI.
 *
 * Classifies failures and prints contextual suggestions to help users
 * resolve them quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { GenerationSpecError } from '../generation/index.js';
import { LedgerError } from '../ledger/index.js';
import { FatalInputError } from '../recovery/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import type { DisplayOptions } from './types.js';

/**
 * Error thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Error categories reported by the CLI.
 */
export type ErrorType =
  | 'usage_error'
  | 'config_error'
  | 'target_error'
  | 'ledger_error'
  | 'verifier_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** Offending file or directory. */
    filePath?: string;
    /** Offending configuration fields, one line each. */
    fields?: readonly string[];
    /** Offending environment variable. */
    envVar?: string;
    /** Extra detail carried by the error. */
    note?: string;
  };
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage_error: [
    {
      text: 'Check the command syntax',
      action: 'sesame help',
    },
  ],

  config_error: [
    {
      text: 'Check sesame.toml against the documented sections',
      action: 'sesame help',
    },
    {
      text: 'Look for SESAME_* environment variables overriding the file',
      action: 'env | grep ^SESAME_',
    },
    {
      text: 'Templated mode needs at least one base word',
      action: 'bases = ["summer", "winter"] under [search]',
    },
  ],

  target_error: [
    {
      text: 'Check the document path is correct and points to a regular file',
    },
    {
      text: 'Pass the document as the first argument',
      action: 'sesame run <document>',
    },
  ],

  ledger_error: [
    {
      text: 'Check the ledger directory is writable',
      action: 'ls -ld .sesame/ledger',
    },
    {
      text: 'Make sure no other sesame run uses the same document name',
    },
    {
      text: 'Inspect the checked file for stray bytes if it was edited by hand',
    },
  ],

  verifier_error: [
    {
      text: 'Check the verifier command is installed',
      action: 'msoffcrypto-tool --help',
    },
    {
      text: 'Review [verifier] arguments and the wrong-password pattern',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'SESAME_CLI_DEBUG=true sesame run <document>',
    },
  ],
};

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('usage') ||
    lowerMessage.includes('unknown option') ||
    lowerMessage.includes('unknown command') ||
    lowerMessage.includes('requires a')
  ) {
    return 'usage_error';
  }

  if (
    lowerMessage.includes('config') ||
    lowerMessage.includes('toml') ||
    lowerMessage.includes('environment variable')
  ) {
    return 'config_error';
  }

  if (lowerMessage.includes('ledger') || lowerMessage.includes('checked file')) {
    return 'ledger_error';
  }

  if (lowerMessage.includes('verifier') || lowerMessage.includes('spawn')) {
    return 'verifier_error';
  }

  if (
    lowerMessage.includes('document') ||
    lowerMessage.includes('target') ||
    lowerMessage.includes('enoent')
  ) {
    return 'target_error';
  }

  return 'unknown';
}

/**
 * Classifies a thrown value, preferring its class over its message.
 *
 * @param error - The thrown value.
 * @returns The error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage_error';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError ||
    error instanceof GenerationSpecError
  ) {
    return 'config_error';
  }
  if (error instanceof FatalInputError || error instanceof PathValidationError) {
    return 'target_error';
  }
  if (error instanceof LedgerError) {
    return 'ledger_error';
  }
  if (error instanceof Error) {
    return inferErrorType(error.message);
  }
  return inferErrorType(String(error));
}

/**
 * Builds the suggestion context for a thrown value.
 *
 * @param error - The thrown value.
 * @returns The error context.
 */
export function errorContextFor(error: unknown): ErrorContext {
  const errorType = classifyError(error);

  if (error instanceof ConfigValidationError) {
    return {
      errorType,
      details: { fields: error.errors.map((e) => `${e.field}: ${e.message}`) },
    };
  }
  if (error instanceof EnvCoercionError) {
    return { errorType, details: { envVar: error.envVar } };
  }
  if (error instanceof FatalInputError && error.path !== '') {
    return { errorType, details: { filePath: error.path } };
  }
  if (error instanceof PathValidationError) {
    return { errorType, details: { filePath: error.invalidPath } };
  }
  if (error instanceof LedgerError && error.details !== undefined) {
    return { errorType, details: { note: error.details } };
  }
  return { errorType };
}

/**
 * Returns the headline for a thrown value. Validation errors list their
 * fields through {@link errorContextFor}, so only the summary line is kept.
 *
 * @param error - The thrown value.
 * @returns The message to print after "Error:".
 */
export function errorMessageFor(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    const [summary = error.message] = error.message.split('\n');
    return summary.replace(/:$/, '');
  }
  return error instanceof Error ? error.message : String(error);
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = ERROR_SUGGESTIONS[errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}Path:${resetCode} ${context.details.filePath}`;
  }

  if (context.details?.envVar !== undefined) {
    result += `\n  ${yellowCode}Variable:${resetCode} ${context.details.envVar}`;
  }

  if (context.details?.note !== undefined) {
    result += `\n  ${yellowCode}Note:${resetCode} ${context.details.note}`;
  }

  for (const field of context.details?.fields ?? []) {
    result += `\n  ${yellowCode}-${resetCode} ${field}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  for (let i = 0; i < suggestions.length; i++) {
    const suggestion = suggestions[i];
    if (suggestion !== undefined) {
      result += '\n' + formatSuggestion(suggestion, i + 1, options);
    }
  }

  return result;
}

/**
 * Displays error message with suggestions to stderr.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}

/**
 * Gets recoverable status for error type.
 *
 * @param errorType - The type of error.
 * @returns Whether the user can typically fix the error and rerun.
 */
export function isErrorRecoverable(errorType: ErrorType): boolean {
  switch (errorType) {
    case 'usage_error':
      return true;
    case 'config_error':
      return true;
    case 'target_error':
      return true;
    case 'verifier_error':
      return true;
    case 'ledger_error':
      return false;
    case 'unknown':
      return false;
    default: {
      const exhaustiveCheck: never = errorType;
      return exhaustiveCheck;
    }
  }
}
