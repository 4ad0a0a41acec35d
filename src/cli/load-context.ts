import { createMatcherContext, createResolverContext } from '../context.js';
import type { MatcherContext, ResolverContext, ResolverContextOptions } from '../context.js';
import type { ResolverConfig } from '../config/index.js';
import { extractFlag, parseOsFlag } from './args.js';

function optionsFromArgs(args: string[], overrides: Partial<ResolverConfig>): ResolverContextOptions {
  const os = parseOsFlag(args);
  if (!os.ok) {
    throw new Error(os.error);
  }

  return {
    configPath: extractFlag(args, 'config'),
    overrides: os.value ? { ...overrides, osFamily: os.value } : overrides,
  };
}

/**
 * Build the resolver context from CLI flags: --config=<path>, --os=<family>
 * and any extra overrides the command supplies.
 *
 * @throws {ConfigError} On an invalid config file
 * @throws {Error} On an invalid --os value
 */
export async function loadContextFromArgs(
  args: string[],
  overrides: Partial<ResolverConfig> = {},
): Promise<ResolverContext> {
  return createResolverContext(optionsFromArgs(args, overrides));
}

/**
 * Same flags as loadContextFromArgs, building only the approximate matcher.
 */
export async function loadMatcherContextFromArgs(args: string[]): Promise<MatcherContext> {
  return createMatcherContext(optionsFromArgs(args, {}));
}
