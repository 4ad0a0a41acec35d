/**
 * Operating-system family threaded through every resolution call.
 *
 * Detected once from the host platform identifier when the resolver
 * context is built. No other OS-specific branching happens in the core.
 */

import { z } from 'zod';

export const OsFamilySchema = z.enum(['windows', 'linux']);

export type OsFamily = z.infer<typeof OsFamilySchema>;

/**
 * Map a Node.js platform identifier to an OS family.
 *
 * `win32` is the only platform treated as Windows; macOS, the BSDs and
 * everything else share the POSIX (linux) command set.
 *
 * @example
 * ```ts
 * detectOsFamily('win32');  // => 'windows'
 * detectOsFamily('darwin'); // => 'linux'
 * ```
 */
export function detectOsFamily(platform: string = process.platform): OsFamily {
  return platform === 'win32' ? 'windows' : 'linux';
}

/**
 * Path separator used when joining a directory and a file name for a family.
 */
export function pathSeparator(osFamily: OsFamily): string {
  return osFamily === 'windows' ? '\\' : '/';
}
