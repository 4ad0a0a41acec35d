// OS family
export { OsFamilySchema, detectOsFamily, pathSeparator } from './types/os-family.js';
export type { OsFamily } from './types/os-family.js';

// Query normalization
export * from './query/index.js';

// Curated data
export * from './dataset/index.js';

// Configuration
export * from './config/index.js';

// Approximate matching and problem diagnosis
export * from './matching/index.js';

// Parameter/template resolver
export * from './templates/index.js';

// Intent classifier
export * from './classifier/index.js';

// Rule matcher
export * from './rules/index.js';

// Resolution cascade, errors and audit log
export * from './resolver/index.js';

// Multi-command requests
export * from './chain/index.js';

// Risk gate
export * from './safety/index.js';

// Resolver context factory
export { createMatcherContext, createResolverContext, buildClassifier } from './context.js';
export type { MatcherContext, ResolverContext, ResolverContextOptions } from './context.js';
