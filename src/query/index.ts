/**
 * Query normalization module.
 */

export { ProcessedQuerySchema, QueryParameterNameSchema } from './types.js';
export type { ProcessedQuery, QueryParameters, QueryParameterName } from './types.js';

export {
  normalize,
  normalizeText,
  extractKeywords,
  extractLiteralParameters,
  STOP_WORDS,
  ACTION_KEYWORDS,
  TARGET_KEYWORDS,
  LITERAL_PARAMETER_FAMILIES,
} from './query-normalizer.js';

export {
  firstMatch,
  matchFamilies,
  matchesAny,
  containsWord,
  escapeRegExp,
  captureRule,
  constantRule,
} from './pattern-rules.js';
export type { PatternRule, RuleFamily } from './pattern-rules.js';
