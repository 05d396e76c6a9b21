/**
 * Candidate generation: case variants, templated and exhaustive generators,
 * deduplication and search-space estimates.
 *
 * @packageDocumentation
 */

export {
  ASCII_LETTERS,
  DIGITS,
  PUNCTUATION,
  DEFAULT_CHARSET,
  caseClosure,
  isAlphabetic,
  isPrintableCharsetMember,
  normalizeCharset,
} from './charset.js';
export {
  countAlphabetic,
  countCaseVariants,
  expandCaseVariants,
  variantSet,
} from './case-variants.js';
export { DEFAULT_MAX_LENGTH, GenerationSpecError, createGenerationSpec } from './spec.js';
export { buildTemplateVariants, generateTemplated, type TemplateVariants } from './templated.js';
export {
  buildBodyAlphabets,
  buildExhaustivePlan,
  codePointLength,
  enumerateBodies,
  generateExhaustive,
  type BodyAlphabets,
  type ExhaustivePlan,
} from './exhaustive.js';
export { DeduplicationFilter, isUniquelyDecomposable } from './dedup.js';
export { createCandidateStream } from './stream.js';
export { countBodies, estimateSearchSpace, type SearchSpaceEstimate } from './estimate.js';
export {
  DEDUP_POLICIES,
  GENERATION_MODES,
  type CandidateStream,
  type DedupPolicy,
  type GenerationMode,
  type GenerationSpec,
  type GenerationSpecInput,
} from './types.js';
