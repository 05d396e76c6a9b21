/**
 * Character classes used by exhaustive enumeration.
 *
 * @packageDocumentation
 */

/** ASCII letters, lower case first. */
export const ASCII_LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

/** ASCII digits. */
export const DIGITS = '0123456789';

/** The 32 printable ASCII punctuation characters. */
export const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

/**
 * Default exhaustive-mode charset: letters, then digits, then punctuation.
 * No whitespace and no control characters.
 */
export const DEFAULT_CHARSET: readonly string[] = Object.freeze(
  Array.from(ASCII_LETTERS + DIGITS + PUNCTUATION)
);

const WHITESPACE_OR_CONTROL = /[\s\p{Cc}\p{Cf}]/u;

/**
 * Whether a character has distinct lower and upper case forms.
 *
 * Digits, punctuation and caseless scripts are not alphabetic under this test.
 */
export function isAlphabetic(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

/**
 * Whether a character may appear in an exhaustive charset.
 */
export function isPrintableCharsetMember(char: string): boolean {
  return Array.from(char).length === 1 && !WHITESPACE_OR_CONTROL.test(char);
}

/**
 * Removes duplicate characters, keeping the first occurrence of each.
 */
export function normalizeCharset(chars: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const char of chars) {
    if (!seen.has(char)) {
      seen.add(char);
      result.push(char);
    }
  }
  return result;
}

/**
 * Extends a charset with the opposite-case form of each alphabetic member.
 *
 * Enumerating every string over the closure emits the same set as enumerating
 * the charset and then expanding each string through its case variants, but
 * without repeats. Case forms that are not a single code point (such as the
 * upper case of `ß`) are left out of the closure; the case-variant expander
 * still produces them for tokens.
 *
 * @param charset - Normalized charset.
 * @returns The charset followed by the added forms, in order of first appearance.
 */
export function caseClosure(charset: readonly string[]): string[] {
  const extended: string[] = [];
  for (const char of charset) {
    extended.push(char);
    if (isAlphabetic(char)) {
      for (const form of [char.toLowerCase(), char.toUpperCase()]) {
        if (Array.from(form).length === 1) {
          extended.push(form);
        }
      }
    }
  }
  return normalizeCharset(extended);
}
