/**
 * Type definitions for query normalization.
 *
 * ProcessedQuery is derived from the raw query string and never mutated.
 * Segment queries in a multi-command request are new strings, so they get
 * their own ProcessedQuery.
 */

import { z } from 'zod';

// ============================================================================
// Query Parameters
// ============================================================================

/** Literal parameter kinds pulled out of the original (unstripped) text */
export const QueryParameterNameSchema = z.enum([
  'filename',
  'url',
  'ip',
  'number',
  'port',
  'path',
  'extension',
  'content',
]);

export type QueryParameterName = z.infer<typeof QueryParameterNameSchema>;

export type QueryParameters = Partial<Record<QueryParameterName, string>>;

// ============================================================================
// Processed Query
// ============================================================================

export const ProcessedQuerySchema = z.object({
  /** Input exactly as received */
  original: z.string(),
  /** Lowercased text with punctuation stripped and whitespace collapsed */
  normalized: z.string(),
  /** Normalized tokens with stop-words removed, in input order */
  keywords: z.array(z.string()),
  actions: z.array(z.string()),
  targets: z.array(z.string()),
  /** Keywords that are neither actions nor targets */
  modifiers: z.array(z.string()),
  parameters: z.record(QueryParameterNameSchema, z.string()),
  /** keywords.length > 0 */
  isValid: z.boolean(),
});

export interface ProcessedQuery {
  original: string;
  normalized: string;
  keywords: string[];
  actions: string[];
  targets: string[];
  modifiers: string[];
  parameters: QueryParameters;
  isValid: boolean;
}
