/**
 * `nlcmd search` - raw similarity results and problem diagnoses for a
 * request, without arbitration.
 */

import type { MatcherContext } from '../../context.js';
import { extractPositionalArgs, hasFlag, parseNumberFlag } from '../args.js';
import { formatSearch } from '../format.js';
import { loadMatcherContextFromArgs } from '../load-context.js';

const DEFAULT_SEARCH_THRESHOLD = 70;
const DEFAULT_SEARCH_LIMIT = 5;

/**
 * CLI entry for `search`.
 *
 * @returns Exit code: 0 when anything matched, 1 otherwise
 */
export async function searchCommand(args: string[], context?: MatcherContext): Promise<number> {
  const pretty = hasFlag(args, 'pretty');
  const query = extractPositionalArgs(args);

  if (!query) {
    console.log(JSON.stringify({
      error: 'No request provided',
      help: 'Usage: nlcmd search "lst all fils" [--threshold=N] [--limit=N] [--os=linux]',
    }, null, 2));
    return 1;
  }

  const threshold = parseNumberFlag(args, 'threshold');
  if (!threshold.ok) {
    console.log(JSON.stringify({ error: threshold.error }, null, 2));
    return 1;
  }
  const limit = parseNumberFlag(args, 'limit');
  if (!limit.ok) {
    console.log(JSON.stringify({ error: limit.error }, null, 2));
    return 1;
  }

  try {
    const ctx = context ?? (await loadMatcherContextFromArgs(args));
    if (!ctx.matcher) {
      console.log(JSON.stringify({ error: 'Approximate matcher unavailable: no dataset or diagnosis catalog' }, null, 2));
      return 1;
    }

    const matches = ctx.matcher.search(
      query,
      threshold.value ?? DEFAULT_SEARCH_THRESHOLD,
      limit.value ?? DEFAULT_SEARCH_LIMIT,
      ctx.osFamily,
    );
    const diagnoses = ctx.matcher.diagnose(query, ctx.osFamily);

    if (pretty) {
      console.log(formatSearch(matches, diagnoses).join('\n'));
    } else {
      console.log(JSON.stringify({ query, osFamily: ctx.osFamily, matches, diagnoses }, null, 2));
    }

    return matches.length > 0 || diagnoses.length > 0 ? 0 : 1;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ error: message }, null, 2));
    return 1;
  }
}
