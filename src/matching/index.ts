/**
 * Approximate matching module: similarity scoring, problem diagnosis
 * and the combined smart search.
 */

export { similarity, ratio, partialRatio, tokenSortRatio, tokenSetRatio } from './similarity.js';
export { diagnose, MAX_DIAGNOSES } from './problem-diagnosis.js';
export type { DiagnosisSolution } from './problem-diagnosis.js';
export { ApproximateMatcher, diagnosisConfidence } from './approximate-matcher.js';
export type {
  ApproximateMatcherOptions,
  IndexedCommand,
  SimilarityMatch,
  BestMatch,
  SmartSearchResult,
} from './approximate-matcher.js';
