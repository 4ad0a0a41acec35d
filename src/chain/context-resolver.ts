/**
 * Context resolution between segments of one request.
 *
 * A later segment may refer to a folder an earlier segment created
 * ("create a file named notes.txt inside the folder"). The most recent
 * directory-creation command among earlier successful segments supplies
 * the folder, and the file reference is rewritten to carry its path.
 */

import { matchesAny } from '../query/pattern-rules.js';
import { pathSeparator } from '../types/os-family.js';
import type { OsFamily } from '../types/os-family.js';

const DIRECTORY_CREATION = /\b(?:mkdir|md)\s+(?:-p\s+)?([^\s&|;]+)/i;

export const REFERENCE_PHRASES: readonly RegExp[] = [
  /\b(?:inside|in)\s+(?:the\s+)?folder\b/i,
  /\b(?:inside|in)\s+it\b/i,
  /\b(?:inside|in)\s+that\s+folder\b/i,
  /\binside\s+there\b/i,
];

const FILE_REFERENCE =
  /(file\s+(?:named?|called)\s+)(\S+)\s+(?:inside|in)\s+(?:(?:the|that)\s+)?(?:folder|directory|it|there)\b/i;

/**
 * Folder created by the most recent directory-creation command, quotes
 * stripped, or null.
 */
export function lastCreatedFolder(previousCommands: readonly string[]): string | null {
  for (let i = previousCommands.length - 1; i >= 0; i--) {
    const match = DIRECTORY_CREATION.exec(previousCommands[i]);
    if (match) {
      return match[1].replace(/["']/g, '');
    }
  }
  return null;
}

/**
 * Rewrite a segment's folder reference using earlier commands.
 *
 * @example
 * ```ts
 * resolveContext('create a file named notes.txt inside the folder', ['mkdir proj'], 'windows');
 * // => 'create a file named proj\\notes.txt'
 * ```
 */
export function resolveContext(segment: string, previousCommands: readonly string[], osFamily: OsFamily): string {
  if (!matchesAny(segment, REFERENCE_PHRASES)) {
    return segment;
  }

  const folder = lastCreatedFolder(previousCommands);
  if (!folder) {
    return segment;
  }

  const separator = pathSeparator(osFamily);
  return segment.replace(FILE_REFERENCE, (_whole: string, prefix: string, filename: string) =>
    `${prefix}${folder}${separator}${filename}`,
  );
}
