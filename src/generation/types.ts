/**
 * Types for candidate generation.
 *
 * @packageDocumentation
 */

/**
 * Generation mode.
 *
 * - `templated`: cross product of prefix, base and suffix case variants.
 * - `exhaustive`: every string over the charset up to `maxLength`, optionally
 *   wrapped with prefix and suffix variants.
 */
export type GenerationMode = 'templated' | 'exhaustive';

/** All generation modes. */
export const GENERATION_MODES: readonly GenerationMode[] = ['templated', 'exhaustive'] as const;

/**
 * Deduplication policy.
 *
 * - `auto`: skip the in-memory filter when the stream is duplicate-free by construction.
 * - `always`: always filter.
 */
export type DedupPolicy = 'auto' | 'always';

/** All deduplication policies. */
export const DEDUP_POLICIES: readonly DedupPolicy[] = ['auto', 'always'] as const;

/**
 * Immutable description of one run's search space.
 */
export interface GenerationSpec {
  readonly mode: GenerationMode;
  /** Prefix tokens; `[""]` when none were configured. */
  readonly prefixes: readonly string[];
  /** Suffix tokens; `[""]` when none were configured. */
  readonly suffixes: readonly string[];
  /** Base tokens; non-empty in templated mode, unused in exhaustive mode. */
  readonly bases: readonly string[];
  /** Maximum candidate length in code points (exhaustive mode). */
  readonly maxLength: number;
  /** Ordered, duplicate-free exhaustive charset. */
  readonly charset: readonly string[];
  readonly dedup: DedupPolicy;
}

/**
 * Input accepted by {@link createGenerationSpec}. Omitted fields take defaults.
 */
export interface GenerationSpecInput {
  mode?: GenerationMode | undefined;
  prefixes?: readonly string[] | undefined;
  suffixes?: readonly string[] | undefined;
  bases?: readonly string[] | undefined;
  maxLength?: number | undefined;
  charset?: string | readonly string[] | undefined;
  dedup?: DedupPolicy | undefined;
}

/**
 * A lazy candidate sequence plus how it was assembled.
 */
export interface CandidateStream extends Iterable<string> {
  /** Whether a {@link DeduplicationFilter} wraps the raw generator. */
  readonly deduplicated: boolean;
  /** Candidates dropped as repeats so far (always 0 when not deduplicated). */
  readonly droppedCount: number;
}
