/**
 * Exhaustive candidate generation over a charset.
 *
 * Covers both the wrapped submode (prefix and suffix variants around an
 * enumerated body) and the pure submode, which is the same generator with
 * `prefixes = suffixes = [""]`.
 *
 * @packageDocumentation
 */

import { variantSet } from './case-variants.js';
import { caseClosure, isAlphabetic } from './charset.js';
import type { GenerationSpec } from './types.js';

/**
 * Alphabets for body enumeration, derived once per run.
 */
export interface BodyAlphabets {
  /** Case closure of the charset. */
  readonly all: readonly string[];
  /** Alphabetic members of {@link BodyAlphabets.all}, used for the first body character when there is no prefix. */
  readonly leading: readonly string[];
}

/**
 * Variant sets and alphabets for one exhaustive run.
 */
export interface ExhaustivePlan {
  readonly prefixes: readonly string[];
  readonly suffixes: readonly string[];
  readonly alphabets: BodyAlphabets;
}

/**
 * Builds the alphabets used for body enumeration.
 */
export function buildBodyAlphabets(charset: readonly string[]): BodyAlphabets {
  const all = caseClosure(charset);
  return { all, leading: all.filter(isAlphabetic) };
}

/**
 * Expands prefixes and suffixes and derives the body alphabets.
 */
export function buildExhaustivePlan(spec: GenerationSpec): ExhaustivePlan {
  return {
    prefixes: variantSet(spec.prefixes),
    suffixes: variantSet(spec.suffixes),
    alphabets: buildBodyAlphabets(spec.charset),
  };
}

/**
 * Code-point length of a string.
 */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}

/**
 * Yields every string of exactly `length` characters, first character drawn
 * from `first` and the rest from `rest`, in odometer order.
 */
export function* enumerateBodies(
  length: number,
  first: readonly string[],
  rest: readonly string[]
): Generator<string> {
  if (length < 1 || first.length === 0 || (length > 1 && rest.length === 0)) {
    return;
  }

  const pools = Array.from({ length }, (_, position) => (position === 0 ? first : rest));
  const indices = new Array<number>(length).fill(0);
  const current = pools.map((pool) => pool[0] ?? '');

  for (;;) {
    yield current.join('');

    let cursor = length - 1;
    for (; cursor >= 0; cursor--) {
      const pool = pools[cursor] ?? [];
      const next = (indices[cursor] ?? 0) + 1;
      if (next < pool.length) {
        indices[cursor] = next;
        current[cursor] = pool[next] ?? '';
        break;
      }
      indices[cursor] = 0;
      current[cursor] = pool[0] ?? '';
    }
    if (cursor < 0) {
      return;
    }
  }
}

/**
 * Yields the exhaustive candidates for one spec.
 *
 * For each (prefix variant, suffix variant) pair:
 * - pairs longer than `maxLength` are skipped;
 * - pairs exactly `maxLength` long yield `prefix + suffix`;
 * - otherwise every body of length `1..maxLength - len(prefix) - len(suffix)` is
 *   enumerated, its first character alphabetic whenever the prefix is empty.
 *
 * Bodies range over the case closure of the charset, which emits the same set
 * as case-expanding each body over the charset itself.
 *
 * @param spec - Exhaustive spec.
 * @param plan - Precomputed plan, if the caller already has one.
 */
export function* generateExhaustive(
  spec: GenerationSpec,
  plan: ExhaustivePlan = buildExhaustivePlan(spec)
): Generator<string> {
  const { all, leading } = plan.alphabets;

  for (const prefix of plan.prefixes) {
    const prefixLength = codePointLength(prefix);
    for (const suffix of plan.suffixes) {
      const wrapperLength = prefixLength + codePointLength(suffix);
      if (wrapperLength > spec.maxLength) {
        continue;
      }
      if (wrapperLength === spec.maxLength) {
        yield `${prefix}${suffix}`;
        continue;
      }

      const first = prefix === '' ? leading : all;
      for (let length = 1; length <= spec.maxLength - wrapperLength; length++) {
        for (const body of enumerateBodies(length, first, all)) {
          yield `${prefix}${body}${suffix}`;
        }
      }
    }
  }
}
