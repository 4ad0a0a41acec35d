/**
 * Keyword-weighted problem diagnosis over the troubleshooting catalog.
 *
 * A category participates when at least one of its keywords occurs in the
 * query (substring match, so multi-word keywords like "not working" work).
 * Each of its entries for the requested OS family is then scored:
 *
 *   relevance = (category keywords present) + (words shared with the problem phrase)
 *
 * Entries sharing no word with the query are skipped. The three most
 * relevant solutions are returned, ties kept in catalog order.
 */

import type { DiagnosisCatalog } from '../dataset/types.js';
import type { OsFamily } from '../types/os-family.js';

/** Maximum solutions returned by diagnose() */
export const MAX_DIAGNOSES = 3;

/** A catalog entry matched against a query */
export interface DiagnosisSolution {
  command: string;
  explanation: string;
  category: string;
  problem: string;
  relevance: number;
}

function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((w) => w.length > 0));
}

/**
 * Rank troubleshooting solutions for a problem description.
 *
 * @example
 * ```ts
 * diagnose('internet not wrking', 'windows', catalog)[0];
 * // => { problem: 'internet not working', relevance: 3, category: 'network', ... }
 * ```
 */
export function diagnose(
  query: string,
  osFamily: OsFamily,
  catalog: DiagnosisCatalog,
): DiagnosisSolution[] {
  const queryLower = query.toLowerCase();
  const queryWords = wordSet(queryLower);
  const solutions: DiagnosisSolution[] = [];

  for (const category of catalog.categories) {
    const keywordMatches = category.keywords.filter((kw) => queryLower.includes(kw.toLowerCase())).length;
    if (keywordMatches === 0) continue;

    for (const entry of category[osFamily]) {
      const problemWords = wordSet(entry.problem.toLowerCase());
      let overlap = 0;
      for (const word of problemWords) {
        if (queryWords.has(word)) overlap++;
      }
      if (overlap === 0) continue;

      solutions.push({
        command: entry.solution,
        explanation: entry.explanation,
        category: category.category,
        problem: entry.problem,
        relevance: overlap + keywordMatches,
      });
    }
  }

  solutions.sort((a, b) => b.relevance - a.relevance);
  return solutions.slice(0, MAX_DIAGNOSES);
}
