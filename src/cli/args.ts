/**
 * Argument parsing helpers shared by the CLI commands.
 */

import { z } from 'zod';
import { OsFamilySchema } from '../types/os-family.js';
import type { OsFamily } from '../types/os-family.js';
import { RestrictableMethodSchema } from '../resolver/types.js';
import type { RestrictableMethod } from '../resolver/types.js';

/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present in args.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(`--${flag}`);
}

/**
 * Extract positional args (everything that is not a --flag).
 * Joins them with spaces to reconstruct the original input text.
 */
export function extractPositionalArgs(args: string[]): string {
  return args
    .filter((a) => !a.startsWith('--'))
    .join(' ')
    .trim();
}

/** Outcome of parsing a typed flag: absent, valid, or an error message */
export type FlagResult<T> = { ok: true; value: T | undefined } | { ok: false; error: string };

export function parseOsFlag(args: string[]): FlagResult<OsFamily> {
  const raw = extractFlag(args, 'os');
  if (raw === undefined) return { ok: true, value: undefined };
  const result = OsFamilySchema.safeParse(raw);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, error: `Invalid --os value "${raw}" (expected windows or linux)` };
}

export function parseMethodFlag(args: string[]): FlagResult<RestrictableMethod> {
  const raw = extractFlag(args, 'method');
  if (raw === undefined) return { ok: true, value: undefined };
  const result = RestrictableMethodSchema.safeParse(raw);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, error: `Invalid --method value "${raw}" (expected ml, fuzzy or rule)` };
}

/** Whole flag value as a finite number; trailing text is rejected */
const NumberFlagSchema = z.string().trim().min(1).pipe(z.coerce.number().finite());

export function parseNumberFlag(args: string[], flag: string): FlagResult<number> {
  const raw = extractFlag(args, flag);
  if (raw === undefined) return { ok: true, value: undefined };
  const result = NumberFlagSchema.safeParse(raw);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, error: `Invalid --${flag} value "${raw}" (expected a number)` };
}
