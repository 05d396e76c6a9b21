/**
 * Per-run deduplication of candidate streams.
 *
 * @packageDocumentation
 */

import { codePointLength } from './exhaustive.js';

/**
 * Suppresses candidates that were already emitted during the current run.
 *
 * Memory grows with the number of distinct candidates seen, which is the
 * limiting cost of exhaustive mode at larger lengths. Use
 * {@link isUniquelyDecomposable} to skip the filter when the generator cannot
 * produce repeats.
 *
 * @example
 * ```typescript
 * const filter = new DeduplicationFilter();
 * [...filter.filter(['a', 'b', 'a'])]; // ['a', 'b']
 * filter.droppedCount; // 1
 * ```
 */
export class DeduplicationFilter {
  private readonly seen = new Set<string>();
  private dropped = 0;

  /** Number of distinct candidates emitted so far. */
  get size(): number {
    return this.seen.size;
  }

  /** Number of repeats dropped so far. */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Whether a candidate was already emitted.
   */
  has(candidate: string): boolean {
    return this.seen.has(candidate);
  }

  /**
   * Lazily passes through each candidate the first time it is seen.
   *
   * @param stream - Raw candidate stream.
   */
  *filter(stream: Iterable<string>): Generator<string> {
    for (const candidate of stream) {
      if (this.seen.has(candidate)) {
        this.dropped++;
        continue;
      }
      this.seen.add(candidate);
      yield candidate;
    }
  }
}

function hasUniformLength(values: readonly string[]): boolean {
  const [first, ...rest] = values;
  if (first === undefined) {
    return true;
  }
  const length = codePointLength(first);
  return rest.every((value) => codePointLength(value) === length);
}

/**
 * Whether every assembled candidate splits back into exactly one
 * (prefix, body, suffix) triple.
 *
 * Holds when all prefix variants share one length and all suffix variants
 * share one length. With deduplicated variant sets, the product then cannot
 * render the same string twice.
 *
 * @param prefixVariants - Deduplicated prefix variants.
 * @param suffixVariants - Deduplicated suffix variants.
 */
export function isUniquelyDecomposable(
  prefixVariants: readonly string[],
  suffixVariants: readonly string[]
): boolean {
  return hasUniformLength(prefixVariants) && hasUniformLength(suffixVariants);
}
