/**
 * Search-space size estimates.
 *
 * Counts are exact for the raw generators and an upper bound on the number of
 * distinct candidates once deduplication applies.
 *
 * @packageDocumentation
 */

import { buildExhaustivePlan, codePointLength } from './exhaustive.js';
import { buildTemplateVariants } from './templated.js';
import type { GenerationSpec } from './types.js';

/**
 * Breakdown of a search-space estimate.
 */
export interface SearchSpaceEstimate {
  readonly mode: GenerationSpec['mode'];
  /** Candidates the raw generator yields before deduplication. */
  readonly candidates: bigint;
  readonly prefixVariants: number;
  readonly suffixVariants: number;
  /** Base variants (templated) or body alphabet size (exhaustive). */
  readonly bodyChoices: number;
}

/**
 * Number of bodies of length `1..maxBody` with the given first and rest pools.
 */
export function countBodies(maxBody: number, first: number, rest: number): bigint {
  let total = 0n;
  let tail = 1n;
  for (let length = 1; length <= maxBody; length++) {
    total += BigInt(first) * tail;
    tail *= BigInt(rest);
  }
  return total;
}

/**
 * Estimates how many candidates a spec produces.
 *
 * @param spec - Generation spec.
 * @returns Counts before deduplication.
 *
 * @example
 * ```typescript
 * estimateSearchSpace(createGenerationSpec({ mode: 'exhaustive', maxLength: 1 })).candidates; // 52n
 * ```
 */
export function estimateSearchSpace(spec: GenerationSpec): SearchSpaceEstimate {
  if (spec.mode === 'templated') {
    const variants = buildTemplateVariants(spec);
    return {
      mode: spec.mode,
      candidates:
        BigInt(variants.prefixes.length) *
        BigInt(variants.bases.length) *
        BigInt(variants.suffixes.length),
      prefixVariants: variants.prefixes.length,
      suffixVariants: variants.suffixes.length,
      bodyChoices: variants.bases.length,
    };
  }

  const plan = buildExhaustivePlan(spec);
  const { all, leading } = plan.alphabets;
  let candidates = 0n;
  for (const prefix of plan.prefixes) {
    for (const suffix of plan.suffixes) {
      const wrapperLength = codePointLength(prefix) + codePointLength(suffix);
      if (wrapperLength > spec.maxLength) {
        continue;
      }
      if (wrapperLength === spec.maxLength) {
        candidates += 1n;
        continue;
      }
      const first = prefix === '' ? leading.length : all.length;
      candidates += countBodies(spec.maxLength - wrapperLength, first, all.length);
    }
  }

  return {
    mode: spec.mode,
    candidates,
    prefixVariants: plan.prefixes.length,
    suffixVariants: plan.suffixes.length,
    bodyChoices: all.length,
  };
}
