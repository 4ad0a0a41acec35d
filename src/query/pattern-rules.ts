/**
 * Declarative pattern rules and the single matching loop that evaluates them.
 *
 * Every ordered regex table in the resolver (literal parameters, intents,
 * nested operations, context references) is expressed as a list of
 * `{ pattern, extract }` records. Tables stay plain data and can be tested
 * apart from the loop that walks them.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One ordered rule: a pattern plus a function turning its match into a value.
 *
 * `extract` may return null to decline a match (the loop then tries the
 * next rule).
 */
export interface PatternRule<T> {
  pattern: RegExp;
  extract: (match: RegExpExecArray) => T | null;
}

/** A labelled group of rules, evaluated in table order. */
export interface RuleFamily<K extends string, T> {
  key: K;
  rules: ReadonlyArray<PatternRule<T>>;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Rule that yields the given capture group (default 1) of its match.
 */
export function captureRule(pattern: RegExp, group: number = 1): PatternRule<string> {
  return {
    pattern,
    extract: (match) => match[group] ?? null,
  };
}

/**
 * Rule that yields a constant value whenever the pattern matches.
 */
export function constantRule<T>(pattern: RegExp, value: T): PatternRule<T> {
  return { pattern, extract: () => value };
}

// ============================================================================
// Matching Loop
// ============================================================================

/**
 * Evaluate rules in order and return the first extracted value.
 *
 * Global patterns are reset before use so a shared table never carries
 * `lastIndex` state between calls.
 */
export function firstMatch<T>(text: string, rules: ReadonlyArray<PatternRule<T>>): T | null {
  for (const rule of rules) {
    rule.pattern.lastIndex = 0;
    const match = rule.pattern.exec(text);
    if (!match) continue;

    const value = rule.extract(match);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

/**
 * Evaluate every family; each family contributes its first extracted value.
 *
 * Families without a match are absent from the result.
 */
export function matchFamilies<K extends string, T>(
  text: string,
  families: ReadonlyArray<RuleFamily<K, T>>,
): Partial<Record<K, T>> {
  const result: Partial<Record<K, T>> = {};
  for (const family of families) {
    const value = firstMatch(text, family.rules);
    if (value !== null) {
      result[family.key] = value;
    }
  }
  return result;
}

/**
 * True when any pattern in the list matches the text.
 */
export function matchesAny(text: string, patterns: ReadonlyArray<RegExp>): boolean {
  return patterns.some((pattern) => {
    pattern.lastIndex = 0;
    return pattern.test(text);
  });
}

/**
 * Word-boundary test for a plain keyword (regex metacharacters escaped).
 */
export function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}\\b`, 'i').test(text);
}

/** Escape regex metacharacters in a literal string. */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
