/**
 * Reader for nlcmd.config.json.
 *
 * A missing file means defaults. An unreadable, non-JSON or
 * schema-invalid file raises ConfigError naming the offending field.
 */

import { readFile } from 'fs/promises';
import { ConfigError } from '../resolver/errors.js';
import { ResolverConfigSchema, DEFAULT_RESOLVER_CONFIG } from './types.js';
import type { ResolverConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'nlcmd.config.json';

/**
 * Parse config file content.
 *
 * @returns Config with defaults applied, or null for empty, non-JSON,
 *   non-object or invalid content
 */
export function parseConfig(content: string): ResolverConfig | null {
  if (!content || !content.trim()) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return null;
  }

  const result = ResolverConfigSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Read and validate the config file.
 *
 * @param configPath - Defaults to nlcmd.config.json in the working directory
 * @throws {ConfigError} On invalid JSON or validation failure
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<ResolverConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_RESOLVER_CONFIG;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = ResolverConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      `Config validation failed:\n${errors.join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}
