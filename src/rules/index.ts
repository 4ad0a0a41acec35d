export { TableRuleMatcher, isNoOpPlaceholder, noOpPlaceholder } from './rule-matcher.js';
export type { RuleMatcher } from './rule-matcher.js';
