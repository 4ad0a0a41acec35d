/**
 * Query normalizer.
 *
 * Tokenizes raw text, drops stop-words, sorts the remaining keywords into
 * actions / targets / modifiers, and pulls literal parameters (filenames,
 * URLs, IPs, numbers, ports, paths, extensions, quoted content) out of the
 * original text.
 *
 * An empty or all-stop-word input produces `isValid: false`. Callers treat
 * that as terminal: no resolution strategy runs.
 */

import type { ProcessedQuery, QueryParameterName } from './types.js';
import { captureRule, matchFamilies } from './pattern-rules.js';
import type { RuleFamily } from './pattern-rules.js';

// ============================================================================
// Vocabularies
// ============================================================================

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from',
  'has', 'he', 'in', 'is', 'it', 'its', 'of', 'on', 'that', 'the',
  'to', 'was', 'will', 'with', 'i', 'you', 'we', 'they', 'can',
  'could', 'would', 'should', 'do', 'does', 'did', 'have', 'had',
]);

export const ACTION_KEYWORDS: ReadonlySet<string> = new Set([
  'list', 'show', 'get', 'find', 'search', 'display', 'view',
  'kill', 'stop', 'terminate', 'end', 'close',
  'start', 'run', 'execute', 'launch', 'open',
  'delete', 'remove', 'erase', 'clear', 'clean',
  'copy', 'move', 'rename', 'change',
  'create', 'make', 'add', 'new',
  'install', 'update', 'upgrade', 'download',
  'check', 'verify', 'test', 'ping',
  'shutdown', 'reboot', 'restart', 'logout',
]);

export const TARGET_KEYWORDS: ReadonlySet<string> = new Set([
  'file', 'files', 'directory', 'folder', 'path',
  'process', 'processes', 'task', 'service', 'services',
  'user', 'users', 'group', 'groups',
  'network', 'ip', 'port', 'ports', 'connection',
  'disk', 'memory', 'cpu', 'system', 'info', 'information',
  'package', 'program', 'application', 'app',
  'firewall', 'security', 'permission', 'permissions',
  'temp', 'temporary', 'cache', 'log', 'logs',
  'hidden', 'all', 'recursive',
]);

// ============================================================================
// Literal Parameter Patterns
// ============================================================================

/**
 * Ordered pattern families. Within a family the first matching pattern
 * wins; families are independent of one another.
 */
export const LITERAL_PARAMETER_FAMILIES: ReadonlyArray<RuleFamily<QueryParameterName, string>> = [
  {
    key: 'filename',
    rules: [captureRule(/\b([\w-]+\.\w+)\b/)],
  },
  {
    key: 'url',
    rules: [captureRule(/(https?:\/\/[\w.-]+(?:\/[\w.-]*)*)/i)],
  },
  {
    key: 'ip',
    rules: [captureRule(/\b((?:\d{1,3}\.){3}\d{1,3})\b/)],
  },
  {
    key: 'number',
    rules: [captureRule(/\b(\d+)\b/)],
  },
  {
    key: 'port',
    rules: [
      captureRule(/\bport\s+(\d+)/i),
      captureRule(/:(\d{2,5})\b/),
    ],
  },
  {
    key: 'path',
    rules: [
      captureRule(/\b(?:in|to|at)\s+["']([A-Za-z]:[\\/].+?)["']/),
      captureRule(/\b(?:in|to|at)\s+["']([/~].+?)["']/),
      captureRule(/\b(?:in|to|at)\s+([A-Za-z]:[\\/]\S+)/),
      captureRule(/\b(?:in|to|at)\s+([/~]\S+)/),
    ],
  },
  {
    key: 'extension',
    rules: [
      captureRule(/\.(\w+)\s+files?\b/i),
      captureRule(/\bfiles?\s+with\s+\.(\w+)/i),
    ],
  },
  {
    key: 'content',
    rules: [
      captureRule(/\bwith\s+content\s+["'](.+?)["']/i),
      captureRule(/\bcontaining\s+["'](.+?)["']/i),
      captureRule(/\btext\s+["'](.+?)["']/i),
    ],
  },
];

// ============================================================================
// Normalization
// ============================================================================

/**
 * Lowercase, trim, replace everything except letters, digits, underscore,
 * whitespace and hyphen with a space, then collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalized tokens with stop-words removed, in input order.
 */
export function extractKeywords(text: string): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];
  return normalized.split(' ').filter((word) => !STOP_WORDS.has(word));
}

/**
 * Extract literal parameters from the original text.
 */
export function extractLiteralParameters(text: string): ProcessedQuery['parameters'] {
  return matchFamilies(text, LITERAL_PARAMETER_FAMILIES);
}

/**
 * Normalize a raw query into a ProcessedQuery.
 *
 * @example
 * ```ts
 * normalize('Kill chrome process!');
 * // => { normalized: 'kill chrome process',
 * //      keywords: ['kill', 'chrome', 'process'],
 * //      actions: ['kill'], targets: ['process'], modifiers: ['chrome'],
 * //      parameters: {}, isValid: true }
 * ```
 */
export function normalize(text: string): ProcessedQuery {
  const normalized = normalizeText(text);
  const keywords = extractKeywords(text);

  const actions = keywords.filter((kw) => ACTION_KEYWORDS.has(kw));
  const targets = keywords.filter((kw) => TARGET_KEYWORDS.has(kw));
  const modifiers = keywords.filter((kw) => !ACTION_KEYWORDS.has(kw) && !TARGET_KEYWORDS.has(kw));

  return {
    original: text,
    normalized,
    keywords,
    actions,
    targets,
    modifiers,
    parameters: normalized ? extractLiteralParameters(text) : {},
    isValid: keywords.length > 0,
  };
}
