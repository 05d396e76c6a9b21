/**
 * Construction and validation of {@link GenerationSpec}.
 *
 * @packageDocumentation
 */

import { DEFAULT_CHARSET, isPrintableCharsetMember, normalizeCharset } from './charset.js';
import {
  DEDUP_POLICIES,
  GENERATION_MODES,
  type GenerationSpec,
  type GenerationSpecInput,
} from './types.js';

/** Default maximum length for exhaustive mode. */
export const DEFAULT_MAX_LENGTH = 4;

/**
 * Error thrown when a generation spec is invalid.
 */
export class GenerationSpecError extends Error {
  /** The offending field. */
  public readonly field: string;

  /**
   * Creates a new GenerationSpecError.
   *
   * @param field - Field that failed validation.
   * @param message - Human-readable error message.
   */
  constructor(field: string, message: string) {
    super(message);
    this.name = 'GenerationSpecError';
    this.field = field;
  }
}

function validateTokens(tokens: readonly string[], field: string): string[] {
  for (const token of tokens) {
    if (token.includes('\n') || token.includes('\r')) {
      throw new GenerationSpecError(
        field,
        `Invalid token in '${field}': line breaks are not allowed (${JSON.stringify(token)})`
      );
    }
  }
  return [...tokens];
}

function orEmptyToken(tokens: readonly string[] | undefined): readonly string[] {
  return tokens === undefined || tokens.length === 0 ? [''] : tokens;
}

/**
 * Builds a frozen generation spec from partial input.
 *
 * Missing prefixes and suffixes become `[""]`; the charset defaults to
 * letters, digits and punctuation.
 *
 * @param input - Partial spec.
 * @returns Validated, immutable spec.
 * @throws GenerationSpecError if any field is invalid.
 *
 * @example
 * ```typescript
 * const spec = createGenerationSpec({ bases: ['ab'] });
 * spec.prefixes; // ['']
 * ```
 */
export function createGenerationSpec(input: GenerationSpecInput = {}): GenerationSpec {
  const mode = input.mode ?? 'templated';
  if (!GENERATION_MODES.includes(mode)) {
    throw new GenerationSpecError(
      'mode',
      `Invalid mode '${String(mode)}': expected one of ${GENERATION_MODES.join(', ')}`
    );
  }

  const dedup = input.dedup ?? 'auto';
  if (!DEDUP_POLICIES.includes(dedup)) {
    throw new GenerationSpecError(
      'dedup',
      `Invalid dedup policy '${String(dedup)}': expected one of ${DEDUP_POLICIES.join(', ')}`
    );
  }

  const maxLength = input.maxLength ?? DEFAULT_MAX_LENGTH;
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new GenerationSpecError(
      'maxLength',
      `Invalid maxLength ${String(maxLength)}: must be a positive integer`
    );
  }

  const bases = validateTokens(input.bases ?? [], 'bases');
  if (mode === 'templated' && bases.length === 0) {
    throw new GenerationSpecError('bases', 'Templated mode requires at least one base token');
  }

  const rawCharset =
    input.charset === undefined
      ? DEFAULT_CHARSET
      : typeof input.charset === 'string'
        ? Array.from(input.charset)
        : input.charset;
  const charset = normalizeCharset(rawCharset);
  const invalid = charset.find((char) => !isPrintableCharsetMember(char));
  if (invalid !== undefined) {
    throw new GenerationSpecError(
      'charset',
      `Invalid charset member ${JSON.stringify(invalid)}: must be a single printable, non-whitespace character`
    );
  }
  if (charset.length === 0) {
    throw new GenerationSpecError('charset', 'Charset must not be empty');
  }

  return Object.freeze({
    mode,
    prefixes: Object.freeze(validateTokens(orEmptyToken(input.prefixes), 'prefixes')),
    suffixes: Object.freeze(validateTokens(orEmptyToken(input.suffixes), 'suffixes')),
    bases: Object.freeze(bases),
    maxLength,
    charset: Object.freeze(charset),
    dedup,
  });
}
