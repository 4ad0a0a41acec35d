/**
 * Parameter/template resolver: query analysis and template fill.
 */

export type {
  TargetType,
  TemplateParameters,
  NestedOperation,
  QueryAnalysis,
  TemplateResolution,
} from './types.js';
export { TargetTypeSchema } from './types.js';

export {
  GIT_INTENT_RULES,
  INTENT_VERBS,
  TARGET_SYNONYMS,
  PARAMETER_FAMILIES,
  PAIR_RULES,
  NESTED_RULES,
  extractParameters,
  extractNestedOperation,
  analyze,
} from './parameter-extractor.js';

export {
  TEMPLATE_CONFIDENCE,
  GIT_DEFAULTS,
  fillTemplate,
  templateKey,
  TemplateEngine,
} from './template-engine.js';
