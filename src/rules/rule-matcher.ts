/**
 * Exact rule matcher: a deterministic keyword table per OS family.
 *
 * A rule matches when every one of its keywords occurs as a word in the
 * normalized query; the first matching rule wins. When nothing matches
 * the matcher returns a no-op placeholder command rather than null, and
 * callers recognize it with isNoOpPlaceholder().
 */

import type { RuleTable } from '../dataset/types.js';
import type { OsFamily } from '../types/os-family.js';
import { normalizeText } from '../query/query-normalizer.js';

// ============================================================================
// Placeholder
// ============================================================================

const PLACEHOLDER_PATTERN = /^echo\s+["']?(command not recognized|unknown command)/i;

/** Command returned when no rule matches */
export function noOpPlaceholder(query: string): string {
  return `echo "Command not recognized: ${query}"`;
}

/**
 * True for the placeholder a rule matcher returns on a miss.
 */
export function isNoOpPlaceholder(command: string): boolean {
  return PLACEHOLDER_PATTERN.test(command.trim());
}

// ============================================================================
// RuleMatcher
// ============================================================================

export interface RuleMatcher {
  match(query: string, osFamily: OsFamily): string;
}

/**
 * @example
 * ```ts
 * const rules = new TableRuleMatcher(loadRuleTable());
 * rules.match('show system info', 'linux'); // => 'uname -a'
 * rules.match('make coffee', 'linux');      // => 'echo "Command not recognized: make coffee"'
 * ```
 */
export class TableRuleMatcher implements RuleMatcher {
  constructor(private readonly table: RuleTable) {}

  match(query: string, osFamily: OsFamily): string {
    const words = new Set(normalizeText(query).split(' '));
    const rule = this.table[osFamily].find((candidate) =>
      candidate.keywords.every((keyword) => words.has(keyword.toLowerCase())),
    );
    return rule ? rule.command : noOpPlaceholder(query);
  }
}
