/**
 * Error taxonomy for the resolver.
 *
 * Only ConfigError and DatasetError are ever thrown to callers. The
 * others describe outcomes: strategy faults are caught at the strategy
 * boundary and folded into a failed candidate, and invalid or unresolved
 * queries are reported through the decision status.
 */

import type { ResolutionMethod } from './types.js';

/** Hint attached to every unresolved decision */
export const NO_RESOLUTION_HINT = 'No matching command found. Try rephrasing or use --help for examples.';

/** Empty or stop-word-only query */
export class InvalidInputError extends Error {
  override name = 'InvalidInputError' as const;

  constructor(message: string = 'Invalid or empty query') {
    super(message);
  }
}

/** An optional collaborator (classifier, matcher, templates, rules) is not loaded */
export class StrategyUnavailableError extends Error {
  override name = 'StrategyUnavailableError' as const;

  constructor(public readonly method: ResolutionMethod, reason: string = 'not loaded') {
    super(`${method} strategy unavailable: ${reason}`);
  }
}

/** Internal fault inside one strategy */
export class StrategyError extends Error {
  override name = 'StrategyError' as const;

  constructor(public readonly method: ResolutionMethod, cause: unknown) {
    super(`${method} strategy failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.cause = cause;
  }
}

/** Every stage ran and none produced a usable command */
export class NoResolutionError extends Error {
  override name = 'NoResolutionError' as const;

  constructor(message: string = NO_RESOLUTION_HINT) {
    super(message);
  }
}

/** Invalid configuration file */
export class ConfigError extends Error {
  override name = 'ConfigError' as const;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

/** Curated dataset missing or invalid where one is required */
export class DatasetError extends Error {
  override name = 'DatasetError' as const;

  constructor(message: string, public readonly path?: string) {
    super(message);
  }
}
