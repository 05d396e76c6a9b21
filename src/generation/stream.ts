/**
 * Candidate stream assembly: mode dispatch plus deduplication policy.
 *
 * @packageDocumentation
 */

import { DeduplicationFilter, isUniquelyDecomposable } from './dedup.js';
import { buildExhaustivePlan, generateExhaustive } from './exhaustive.js';
import { buildTemplateVariants, generateTemplated } from './templated.js';
import type { CandidateStream, GenerationSpec } from './types.js';

class FilteredStream implements CandidateStream {
  readonly deduplicated: boolean;
  private readonly filter: DeduplicationFilter | undefined;
  private readonly source: () => Iterator<string>;

  constructor(source: () => Generator<string>, deduplicate: boolean) {
    this.deduplicated = deduplicate;
    if (deduplicate) {
      const filter = new DeduplicationFilter();
      this.filter = filter;
      this.source = () => filter.filter(source());
    } else {
      this.filter = undefined;
      this.source = source;
    }
  }

  get droppedCount(): number {
    return this.filter?.droppedCount ?? 0;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.source();
  }
}

/**
 * Creates the candidate stream for a spec.
 *
 * Under the `auto` policy the {@link DeduplicationFilter} is applied only when
 * prefix or suffix variants differ in length, which is the only way the
 * generators can emit a string twice. Iterate the stream once per run: the
 * filter's memory is shared between iterations.
 *
 * @param spec - Validated generation spec.
 * @returns A lazy stream of distinct candidates.
 *
 * @example
 * ```typescript
 * const stream = createCandidateStream(createGenerationSpec({ bases: ['ab'] }));
 * [...stream]; // ['ab', 'aB', 'Ab', 'AB']
 * ```
 */
export function createCandidateStream(spec: GenerationSpec): CandidateStream {
  if (spec.mode === 'templated') {
    const variants = buildTemplateVariants(spec);
    const deduplicate =
      spec.dedup === 'always' || !isUniquelyDecomposable(variants.prefixes, variants.suffixes);
    return new FilteredStream(() => generateTemplated(spec, variants), deduplicate);
  }

  const plan = buildExhaustivePlan(spec);
  const deduplicate =
    spec.dedup === 'always' || !isUniquelyDecomposable(plan.prefixes, plan.suffixes);
  return new FilteredStream(() => generateExhaustive(spec, plan), deduplicate);
}
