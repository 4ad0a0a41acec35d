/**
 * Approximate matcher: typo-tolerant lookup over known queries plus
 * problem diagnosis, arbitrated by smartSearch().
 *
 * The index is built once from the curated dataset and never mutated:
 * one case-folded key per known query. The first record for a key is its
 * primary command; the first record per OS family is kept alongside so
 * that a search for one family never returns another family's command.
 */

import type { DatasetEntry, DiagnosisCatalog } from '../dataset/types.js';
import type { OsFamily } from '../types/os-family.js';
import { similarity } from './similarity.js';
import { diagnose } from './problem-diagnosis.js';
import type { DiagnosisSolution } from './problem-diagnosis.js';

// ============================================================================
// Types
// ============================================================================

/** Command information stored for an indexed query */
export interface IndexedCommand {
  command: string;
  intent: string;
  os: OsFamily;
}

interface IndexEntry {
  primary: IndexedCommand;
  byOs: Partial<Record<OsFamily, IndexedCommand>>;
}

/** One similarity search hit */
export interface SimilarityMatch {
  /** Indexed (case-folded) query that matched */
  key: string;
  /** Similarity score, 0-100 */
  score: number;
  info: IndexedCommand;
}

/** The candidate smartSearch() settled on */
export type BestMatch =
  | {
      source: 'fuzzy_match';
      command: string;
      intent: string;
      matchedQuery: string;
      os: OsFamily;
    }
  | {
      source: 'problem_diagnosis';
      command: string;
      explanation: string;
      category: string;
      problem: string;
    };

export interface SmartSearchResult {
  matches: SimilarityMatch[];
  diagnoses: DiagnosisSolution[];
  best: BestMatch | null;
  /** Confidence of `best`, 0-100 (0 when there is none) */
  confidence: number;
}

export interface ApproximateMatcherOptions {
  /** Score cutoff for the search run by smartSearch (default 60) */
  similarityThreshold?: number;
  /** Result limit for the search run by smartSearch (default 5) */
  similarityLimit?: number;
  /** Similarity score accepted without a competing diagnosis (default 85) */
  strongSimilarity?: number;
  /** Diagnosis relevance that lets a diagnosis compete with similarity (default 2) */
  diagnosisMinRelevance?: number;
}

// ============================================================================
// Constants
// ============================================================================

const DIAGNOSIS_BASE_CONFIDENCE = 75;
const DIAGNOSIS_CONFIDENCE_STEP = 5;
const DIAGNOSIS_CONFIDENCE_CAP = 90;

/**
 * Confidence (0-100) assigned to a diagnosis of the given relevance.
 */
export function diagnosisConfidence(relevance: number): number {
  return Math.min(DIAGNOSIS_CONFIDENCE_CAP, DIAGNOSIS_BASE_CONFIDENCE + relevance * DIAGNOSIS_CONFIDENCE_STEP);
}

function diagnosisMatch(solution: DiagnosisSolution): BestMatch {
  return {
    source: 'problem_diagnosis',
    command: solution.command,
    explanation: solution.explanation,
    category: solution.category,
    problem: solution.problem,
  };
}

function similarityMatch(match: SimilarityMatch): BestMatch {
  return {
    source: 'fuzzy_match',
    command: match.info.command,
    intent: match.info.intent,
    matchedQuery: match.key,
    os: match.info.os,
  };
}

// ============================================================================
// ApproximateMatcher
// ============================================================================

/**
 * @example
 * ```ts
 * const matcher = new ApproximateMatcher(datasetEntries(dataset), catalog);
 * matcher.search('lst all fils', 70, 3, 'linux');
 * // => [{ key: 'list all files', score: 92.31, info: { command: 'ls -la', ... } }, ...]
 * matcher.smartSearch('internet not wrking', 'windows').best?.source;
 * // => 'problem_diagnosis'
 * ```
 */
export class ApproximateMatcher {
  private readonly index: ReadonlyMap<string, IndexEntry>;
  private readonly catalog: DiagnosisCatalog | null;
  private readonly options: Required<ApproximateMatcherOptions>;

  constructor(
    entries: DatasetEntry[],
    catalog: DiagnosisCatalog | null = null,
    options: ApproximateMatcherOptions = {},
  ) {
    this.index = ApproximateMatcher.buildIndex(entries);
    this.catalog = catalog;
    this.options = {
      similarityThreshold: options.similarityThreshold ?? 60,
      similarityLimit: options.similarityLimit ?? 5,
      strongSimilarity: options.strongSimilarity ?? 85,
      diagnosisMinRelevance: options.diagnosisMinRelevance ?? 2,
    };
  }

  private static buildIndex(entries: DatasetEntry[]): Map<string, IndexEntry> {
    const index = new Map<string, IndexEntry>();
    for (const entry of entries) {
      const key = entry.query.toLowerCase().trim();
      const info: IndexedCommand = { command: entry.command, intent: entry.intent, os: entry.os };

      const existing = index.get(key);
      if (!existing) {
        const byOs: IndexEntry['byOs'] = {};
        byOs[entry.os] = info;
        index.set(key, { primary: info, byOs });
      } else if (!existing.byOs[entry.os]) {
        existing.byOs[entry.os] = info;
      }
    }
    return index;
  }

  /** Number of distinct indexed queries */
  get size(): number {
    return this.index.size;
  }

  /**
   * Look up the command indexed for an exact (case-folded) query.
   */
  lookup(query: string, osFamily?: OsFamily): IndexedCommand | null {
    const entry = this.index.get(query.toLowerCase().trim());
    if (!entry) return null;
    return osFamily ? entry.byOs[osFamily] ?? null : entry.primary;
  }

  /**
   * Similarity search over every indexed query.
   *
   * Results score at least `threshold`, are sorted by score descending
   * (index order on ties) and truncated to `limit`. With `osFamily`, keys
   * that have no command for that family are skipped.
   */
  search(query: string, threshold: number = 70, limit: number = 5, osFamily?: OsFamily): SimilarityMatch[] {
    const needle = query.toLowerCase().trim();
    if (!needle || limit <= 0) return [];

    const matches: SimilarityMatch[] = [];
    for (const [key, entry] of this.index) {
      const info = osFamily ? entry.byOs[osFamily] : entry.primary;
      if (!info) continue;

      const score = similarity(needle, key);
      if (score >= threshold) {
        matches.push({ key, score, info });
      }
    }

    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, limit);
  }

  /**
   * Troubleshooting solutions for a problem description (top 3).
   * Empty when no diagnosis catalog was loaded.
   */
  diagnose(query: string, osFamily: OsFamily): DiagnosisSolution[] {
    return this.catalog ? diagnose(query, osFamily, this.catalog) : [];
  }

  /**
   * Combined search: similarity lookup plus diagnosis, arbitrated.
   *
   * 1. A diagnosis with relevance >= diagnosisMinRelevance wins when there
   *    is no similarity hit or its confidence is at least the best score.
   * 2. Otherwise a similarity hit scoring >= strongSimilarity wins.
   * 3. Otherwise whichever exists, diagnosis first.
   */
  smartSearch(query: string, osFamily: OsFamily): SmartSearchResult {
    const matches = this.search(query, this.options.similarityThreshold, this.options.similarityLimit, osFamily);
    const diagnoses = this.diagnose(query, osFamily);

    const topMatch = matches[0];
    const topDiagnosis = diagnoses[0];

    if (topDiagnosis && topDiagnosis.relevance >= this.options.diagnosisMinRelevance) {
      const confidence = diagnosisConfidence(topDiagnosis.relevance);
      if (!topMatch || confidence >= topMatch.score) {
        return { matches, diagnoses, best: diagnosisMatch(topDiagnosis), confidence };
      }
    }

    if (topMatch && topMatch.score >= this.options.strongSimilarity) {
      return { matches, diagnoses, best: similarityMatch(topMatch), confidence: topMatch.score };
    }

    if (topDiagnosis) {
      return {
        matches,
        diagnoses,
        best: diagnosisMatch(topDiagnosis),
        confidence: diagnosisConfidence(topDiagnosis.relevance),
      };
    }

    if (topMatch) {
      return { matches, diagnoses, best: similarityMatch(topMatch), confidence: topMatch.score };
    }

    return { matches, diagnoses, best: null, confidence: 0 };
  }
}
