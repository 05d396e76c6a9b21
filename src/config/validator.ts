/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - The search can produce candidates (templated mode has bases, lengths are positive integers)
 * - Tokens and the charset can be stored in the line-based ledger
 * - The verifier arguments reference the right placeholders and the pattern compiles
 * - Paths can be validated via a custom function
 *
 * @packageDocumentation
 */

import { isPrintableCharsetMember } from '../generation/charset.js';
import type { Config, SearchConfig, VerifierConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  /** Whether the path exists. */
  exists: boolean;
  /** Whether the path is a directory (if it exists). */
  isDirectory?: boolean;
  /** Error message if the check failed. */
  errorMessage?: string;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string, isDirectory: boolean) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Function to check if paths exist.
   * If not provided, path validation is skipped.
   */
  pathChecker?: PathChecker;
}

/** Longest exhaustive body accepted. */
export const MAX_EXHAUSTIVE_LENGTH = 64;

/**
 * Validates that a value is a positive integer.
 *
 * @param value - The value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateTokens(tokens: readonly string[], fieldPath: string, errors: ValidationError[]): void {
  tokens.forEach((token, index) => {
    if (token.includes('\n') || token.includes('\r')) {
      errors.push({
        field: `${fieldPath}[${String(index)}]`,
        value: token,
        message: `'${fieldPath}' entries must not contain line breaks`,
      });
    }
  });
}

/**
 * Validates the search section.
 *
 * @param search - The search configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateSearch(search: SearchConfig, errors: ValidationError[]): void {
  if (search.mode === 'templated' && search.bases.length === 0) {
    errors.push({
      field: 'search.bases',
      value: search.bases,
      message: 'Templated mode requires at least one base word in search.bases',
    });
  }

  validatePositiveInteger(search.max_length, 'search.max_length', errors);
  if (search.max_length > MAX_EXHAUSTIVE_LENGTH) {
    errors.push({
      field: 'search.max_length',
      value: search.max_length,
      message: `'search.max_length' exceeds reasonable maximum of ${String(MAX_EXHAUSTIVE_LENGTH)}`,
    });
  }

  validateTokens(search.bases, 'search.bases', errors);
  validateTokens(search.prefixes, 'search.prefixes', errors);
  validateTokens(search.suffixes, 'search.suffixes', errors);

  if (search.charset !== undefined) {
    const invalid = Array.from(search.charset).filter((ch) => !isPrintableCharsetMember(ch));
    if (search.charset === '') {
      errors.push({ field: 'search.charset', value: '', message: "'search.charset' must not be empty" });
    } else if (invalid.length > 0) {
      errors.push({
        field: 'search.charset',
        value: search.charset,
        message: `'search.charset' must contain only printable, non-whitespace characters, found ${JSON.stringify(invalid.join(''))}`,
      });
    }
  }
}

/**
 * Validates the verifier section.
 *
 * @param verifier - The verifier configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateVerifier(verifier: VerifierConfig, errors: ValidationError[]): void {
  if (verifier.command.trim() === '') {
    errors.push({ field: 'verifier.command', value: verifier.command, message: "'verifier.command' must not be empty" });
  }

  if (!verifier.verify_args.some((arg) => arg.includes('{password}'))) {
    errors.push({
      field: 'verifier.verify_args',
      value: verifier.verify_args,
      message: "'verifier.verify_args' must contain the {password} placeholder",
    });
  }

  for (const [field, args] of [
    ['verifier.check_args', verifier.check_args],
    ['verifier.verify_args', verifier.verify_args],
  ] as const) {
    if (!args.some((arg) => arg.includes('{document}'))) {
      errors.push({
        field,
        value: args,
        message: `'${field}' must contain the {document} placeholder`,
      });
    }
  }

  if (verifier.check_args.some((arg) => arg.includes('{password}'))) {
    errors.push({
      field: 'verifier.check_args',
      value: verifier.check_args,
      message: "'verifier.check_args' must not contain the {password} placeholder",
    });
  }

  for (const code of verifier.not_encrypted_exit_codes) {
    if (!Number.isInteger(code) || code <= 0 || code > 255) {
      errors.push({
        field: 'verifier.not_encrypted_exit_codes',
        value: code,
        message: `Exit codes must be integers between 1 and 255, got ${String(code)}`,
      });
    }
  }

  try {
    new RegExp(verifier.wrong_password_pattern);
  } catch (error) {
    errors.push({
      field: 'verifier.wrong_password_pattern',
      value: verifier.wrong_password_pattern,
      message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  validatePositiveInteger(verifier.timeout_ms, 'verifier.timeout_ms', errors);
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const config = await parseConfig(tomlContent);
 * const result = validateConfig(config);
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const { pathChecker } = options;

  const errors: ValidationError[] = [];

  validateSearch(config.search, errors);
  validateVerifier(config.verifier, errors);
  validatePositiveInteger(config.cli.progress_interval, 'cli.progress_interval', errors);

  if (config.paths.ledger.trim() === '') {
    errors.push({ field: 'paths.ledger', value: config.paths.ledger, message: "'paths.ledger' must not be empty" });
  } else if (pathChecker !== undefined) {
    const result = pathChecker(config.paths.ledger, true);
    if (result.exists && result.isDirectory === false) {
      errors.push({
        field: 'paths.ledger',
        value: config.paths.ledger,
        message: result.errorMessage ?? `Path exists but is not a directory: '${config.paths.ledger}'`,
      });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
