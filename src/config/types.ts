/**
 * Resolver configuration schema.
 *
 * Every field has a default, so `ResolverConfigSchema.parse({})` yields a
 * complete configuration.
 */

import { z } from 'zod';
import { OsFamilySchema } from '../types/os-family.js';

export const ClassifierKindSchema = z.enum(['bayes', 'none']);

export type ClassifierKind = z.infer<typeof ClassifierKindSchema>;

export const ResolverConfigSchema = z.object({
  /** Acceptance threshold for classifier candidates (0-1) */
  mlThreshold: z.number().min(0).max(1).default(0.6),
  /** Acceptance threshold for template candidates (0-1) */
  templateThreshold: z.number().min(0).max(1).default(0.9),
  /** Acceptance threshold for approximate-match candidates (0-1) */
  fuzzyThreshold: z.number().min(0).max(1).default(0.75),
  /** Search cutoff used by smartSearch (0-100) */
  similarityThreshold: z.number().min(0).max(100).default(60),
  similarityLimit: z.number().int().positive().default(5),
  /** Similarity score accepted without a competing diagnosis (0-100) */
  strongSimilarity: z.number().min(0).max(100).default(85),
  diagnosisMinRelevance: z.number().int().nonnegative().default(2),
  classifier: ClassifierKindSchema.default('bayes'),
  /** Saved classifier model; trained from the dataset when absent */
  modelPath: z.string().optional(),
  datasetPath: z.string().optional(),
  /** Directory for resolution-log.jsonl; no audit log when absent */
  logDir: z.string().optional(),
  /** Overrides host detection */
  osFamily: OsFamilySchema.optional(),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = ResolverConfigSchema.parse({});
