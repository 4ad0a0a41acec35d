export { ResolverConfigSchema, ClassifierKindSchema, DEFAULT_RESOLVER_CONFIG } from './types.js';
export type { ResolverConfig, ClassifierKind } from './types.js';
export { parseConfig, loadConfig, DEFAULT_CONFIG_FILE } from './config-reader.js';
