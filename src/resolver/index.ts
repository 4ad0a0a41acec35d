/**
 * Resolution cascade: candidate types, error taxonomy, strategy
 * boundary, arbitrator and audit log.
 */

export {
  ResolutionMethodSchema,
  RestrictableMethodSchema,
  ResolutionStatusSchema,
} from './types.js';
export type {
  ResolutionMethod,
  RestrictableMethod,
  StrategyStage,
  CandidateResolution,
  ResolutionStatus,
  ArbitrationDecision,
  ResolveOptions,
  Suggestion,
} from './types.js';

export {
  NO_RESOLUTION_HINT,
  InvalidInputError,
  StrategyUnavailableError,
  StrategyError,
  NoResolutionError,
  ConfigError,
  DatasetError,
} from './errors.js';

export {
  failedCandidate,
  runStrategy,
  invokeStrategy,
  classifierStrategy,
  templateStrategy,
  approximateStrategy,
  ruleStrategy,
} from './strategy.js';
export type { ResolutionStrategy, StrategyOutcome, TemplateResolver, ApproximateSearch } from './strategy.js';

export { ResolutionArbitrator, DEFAULT_THRESHOLDS, lowConfidenceWarning } from './resolution-arbitrator.js';
export type { ArbitratorCollaborators, ArbitratorThresholds } from './resolution-arbitrator.js';

export { ResolutionLogger, ResolutionLogEntrySchema, RESOLUTION_LOG_FILE, toLogEntry } from './resolution-logger.js';
export type { ResolutionLogEntry } from './resolution-logger.js';
