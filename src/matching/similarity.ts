/**
 * Token-weighted string similarity on a 0-100 scale.
 *
 * Combines a plain edit ratio with token-sort, token-set and partial
 * (best-window) ratios, weighting each the way a weighted-ratio scorer
 * does. Edit distance comes from natural's LevenshteinDistance with
 * substitution priced as delete + insert, which makes the base ratio an
 * indel ratio: transpositions, insertions and deletions all cost little
 * against an otherwise similar string.
 */

import natural from 'natural';

// ============================================================================
// Constants
// ============================================================================

/** Scale applied to token-based ratios */
const TOKEN_SCALE = 0.95;

/** Length ratio at or above which partial matching is used */
const PARTIAL_LENGTH_RATIO = 1.5;

/** Length ratio above which partial matches are discounted more heavily */
const LONG_PARTIAL_LENGTH_RATIO = 8;

// ============================================================================
// Primitive Ratios
// ============================================================================

function indelDistance(a: string, b: string): number {
  return natural.LevenshteinDistance(a, b, {
    insertion_cost: 1,
    deletion_cost: 1,
    substitution_cost: 2,
  });
}

/**
 * Normalized indel similarity, 0-100.
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return 100 * (1 - indelDistance(a, b) / total);
}

/**
 * Best ratio of the shorter string against every equally long window of
 * the longer one.
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

function sortedTokens(text: string): string {
  return tokens(text).sort().join(' ');
}

/**
 * Ratio after sorting each side's tokens alphabetically.
 */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortedTokens(a), sortedTokens(b));
}

/**
 * Ratio over the shared token set and each side's remainder.
 *
 * When one side's tokens are a subset of the other's the score is 100.
 */
export function tokenSetRatio(a: string, b: string): number {
  const setA = new Set(tokens(a));
  const setB = new Set(tokens(b));

  const shared = [...setA].filter((t) => setB.has(t)).sort();
  const onlyA = [...setA].filter((t) => !setB.has(t)).sort();
  const onlyB = [...setB].filter((t) => !setA.has(t)).sort();

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 100;
  }

  const base = shared.join(' ');
  const combinedA = [base, onlyA.join(' ')].filter((s) => s.length > 0).join(' ');
  const combinedB = [base, onlyB.join(' ')].filter((s) => s.length > 0).join(' ');

  if (base.length === 0) {
    return ratio(combinedA, combinedB);
  }

  return Math.max(
    ratio(base, combinedA),
    ratio(base, combinedB),
    ratio(combinedA, combinedB),
  );
}

// ============================================================================
// Weighted Ratio
// ============================================================================

/**
 * Weighted similarity score, 0-100 (rounded to two decimals).
 *
 * Similar-length strings take the best of the plain, token-sort and
 * token-set ratios. Strings of very different length switch to partial
 * matching, discounted as the length gap grows.
 *
 * @example
 * ```ts
 * similarity('lst all fils', 'list all files'); // => 92.31
 * similarity('list all files', 'list all files'); // => 100
 * ```
 */
export function similarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
  const base = ratio(a, b);

  let score: number;
  if (lengthRatio < PARTIAL_LENGTH_RATIO) {
    score = Math.max(
      base,
      tokenSortRatio(a, b) * TOKEN_SCALE,
      tokenSetRatio(a, b) * TOKEN_SCALE,
    );
  } else {
    const partialScale = lengthRatio < LONG_PARTIAL_LENGTH_RATIO ? 0.9 : 0.6;
    score = Math.max(
      base,
      partialRatio(a, b) * partialScale,
      partialRatio(sortedTokens(a), sortedTokens(b)) * TOKEN_SCALE * partialScale,
    );
  }

  return Math.round(score * 100) / 100;
}
