/**
 * Case variant expansion.
 *
 * A token with `k` alphabetic characters has exactly `2^k` case variants:
 * every alphabetic position independently takes its lower or upper form and
 * every other position stays as written.
 *
 * @packageDocumentation
 */

import { isAlphabetic } from './charset.js';

/**
 * Lazily yields every case variant of a token.
 *
 * The expansion is an odometer over the alphabetic positions, lower form
 * first, with the last position changing fastest. Callers must not depend on
 * the order. The generator is stateless between invocations, so calling it
 * again restarts the sequence.
 *
 * @param token - Token to expand.
 * @returns Generator of `2^k` distinct strings; `""` yields only `""`.
 *
 * @example
 * ```typescript
 * [...expandCaseVariants('x1')]; // ['x1', 'X1']
 * ```
 */
export function* expandCaseVariants(token: string): Generator<string> {
  const chars = Array.from(token);
  const slots: (readonly [string, string] | undefined)[] = chars.map((char) =>
    isAlphabetic(char) ? ([char.toLowerCase(), char.toUpperCase()] as const) : undefined
  );
  const toggles = slots.flatMap((slot, index) => (slot === undefined ? [] : [index]));

  const current = chars.map((char, index) => slots[index]?.[0] ?? char);
  yield current.join('');

  // Odometer over the toggle positions; a digit set to 1 means the upper form.
  const digits = new Array<0 | 1>(toggles.length).fill(0);
  for (;;) {
    let cursor = toggles.length - 1;
    while (cursor >= 0 && digits[cursor] === 1) {
      digits[cursor] = 0;
      const position = toggles[cursor];
      if (position !== undefined) {
        current[position] = slots[position]?.[0] ?? '';
      }
      cursor--;
    }
    if (cursor < 0) {
      return;
    }
    digits[cursor] = 1;
    const position = toggles[cursor];
    if (position !== undefined) {
      current[position] = slots[position]?.[1] ?? '';
    }
    yield current.join('');
  }
}

/**
 * Number of alphabetic characters in a token.
 */
export function countAlphabetic(token: string): number {
  let count = 0;
  for (const char of token) {
    if (isAlphabetic(char)) {
      count++;
    }
  }
  return count;
}

/**
 * Number of case variants of a token (`2^k`).
 */
export function countCaseVariants(token: string): bigint {
  return 1n << BigInt(countAlphabetic(token));
}

/**
 * Expands every token and returns the union of the variants in first-seen order.
 *
 * Distinct tokens may expand to overlapping sets (for example `"ab"` and `"AB"`),
 * so the union is deduplicated.
 *
 * @param tokens - Tokens to expand.
 * @returns Deduplicated variants.
 */
export function variantSet(tokens: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const token of tokens) {
    for (const variant of expandCaseVariants(token)) {
      seen.add(variant);
    }
  }
  return [...seen];
}
