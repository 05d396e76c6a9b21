/**
 * Templated candidate generation.
 *
 * @packageDocumentation
 */

import { variantSet } from './case-variants.js';
import type { GenerationSpec } from './types.js';

/**
 * Deduplicated case-variant sets for one templated run.
 */
export interface TemplateVariants {
  readonly prefixes: readonly string[];
  readonly bases: readonly string[];
  readonly suffixes: readonly string[];
}

/**
 * Expands prefixes, bases and suffixes into their deduplicated variant sets.
 */
export function buildTemplateVariants(spec: GenerationSpec): TemplateVariants {
  return {
    prefixes: variantSet(spec.prefixes),
    bases: variantSet(spec.bases),
    suffixes: variantSet(spec.suffixes),
  };
}

/**
 * Yields `prefix + base + suffix` for every triple of variant sets.
 *
 * Two different triples can render the same string (`"a" + "bc"` and
 * `"ab" + "c"`); see {@link DeduplicationFilter}.
 *
 * @param spec - Spec with non-empty bases.
 * @param variants - Precomputed variant sets, if the caller already has them.
 */
export function* generateTemplated(
  spec: GenerationSpec,
  variants: TemplateVariants = buildTemplateVariants(spec)
): Generator<string> {
  for (const prefix of variants.prefixes) {
    for (const base of variants.bases) {
      for (const suffix of variants.suffixes) {
        yield `${prefix}${base}${suffix}`;
      }
    }
  }
}
