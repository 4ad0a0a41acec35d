/**
 * Multi-command detection and splitting.
 *
 * A request is multi-command when it holds at least two action verbs
 * and at least one conjunction marker. Splitting tries separators in
 * priority order; the first one producing more than one non-empty
 * segment is used.
 */

import { containsWord } from '../query/pattern-rules.js';
import type { MultiCommandDetection } from './types.js';

// ============================================================================
// Vocabularies
// ============================================================================

export const ACTION_VERBS: ReadonlySet<string> = new Set([
  'create', 'make', 'delete', 'remove', 'copy', 'move',
  'list', 'show', 'find', 'kill', 'stop', 'start', 'run',
  'open', 'close', 'install', 'update', 'rename', 'change',
]);

/** Checked by word boundary, reported in this order */
export const CONJUNCTION_MARKERS: readonly string[] = ['and then', 'after that', 'then', 'and', 'also', 'next'];

/** Priority order: the first separator that splits the text wins */
export const SEGMENT_SEPARATORS: readonly RegExp[] = [
  /\s*,\s*/i,
  /\s*;\s*/i,
  /\s+and\s+then\s+/i,
  /\s+then\s+/i,
  /\s+and\s+/i,
  /\s+also\s+/i,
  /\s+after\s+that\s+/i,
  /\s+next\s+/i,
];

// ============================================================================
// Detection
// ============================================================================

/**
 * @example
 * ```ts
 * detectMultiCommand('list files and then show info');
 * // => { isMultiCommand: true, actionCount: 2, actions: ['list', 'show'],
 * //      markers: ['and then', 'then', 'and'] }
 * ```
 */
export function detectMultiCommand(query: string): MultiCommandDetection {
  const lower = query.toLowerCase();
  const actions = lower.split(/\s+/).filter((token) => ACTION_VERBS.has(token));
  const markers = CONJUNCTION_MARKERS.filter((marker) => containsWord(lower, marker));

  return {
    isMultiCommand: actions.length >= 2 && markers.length > 0,
    actionCount: actions.length,
    actions,
    markers,
  };
}

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split a request into trimmed, non-empty segments.
 *
 * @returns The segments, or the whole trimmed query as one segment when
 *   no separator splits it
 */
export function splitCommands(query: string): string[] {
  for (const separator of SEGMENT_SEPARATORS) {
    const parts = query
      .split(separator)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (parts.length > 1) {
      return parts;
    }
  }
  return [query.trim()];
}
