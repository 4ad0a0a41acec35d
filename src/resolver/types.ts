/**
 * Type definitions for the resolution cascade.
 *
 * - CandidateResolution: output of one strategy
 * - ArbitrationDecision: the arbitrator's verdict over all candidates
 * - ResolutionStatus: resolved / fallback / unresolved / invalid
 */

import { z } from 'zod';
import type { ProcessedQuery } from '../query/types.js';

// ============================================================================
// Methods
// ============================================================================

/**
 * Method that produced a candidate. The approximate stage reports
 * `problem_diagnosis` when its answer came from the troubleshooting
 * catalog and `fuzzy` otherwise.
 */
export const ResolutionMethodSchema = z.enum(['ml', 'template', 'fuzzy', 'problem_diagnosis', 'rule']);

export type ResolutionMethod = z.infer<typeof ResolutionMethodSchema>;

/** Methods a caller may restrict the cascade to */
export const RestrictableMethodSchema = z.enum(['ml', 'fuzzy', 'rule']);

export type RestrictableMethod = z.infer<typeof RestrictableMethodSchema>;

/** Cascade stage, in run order */
export type StrategyStage = 'ml' | 'template' | 'fuzzy' | 'rule';

// ============================================================================
// Candidate
// ============================================================================

/**
 * A command proposal from one strategy.
 *
 * Invariant: when `command` is null, `confidence` is 0 and `succeeded`
 * is false.
 */
export interface CandidateResolution {
  method: ResolutionMethod;
  command: string | null;
  /** 0-1 */
  confidence: number;
  /** The strategy produced a usable command (acceptance thresholds are applied later) */
  succeeded: boolean;
  explanation?: string;
  /** Reason a strategy produced nothing, or the message of a caught fault */
  error?: string;
  metadata: Record<string, unknown>;
}

// ============================================================================
// Decision
// ============================================================================

export const ResolutionStatusSchema = z.enum(['resolved', 'fallback', 'unresolved', 'invalid']);

export type ResolutionStatus = z.infer<typeof ResolutionStatusSchema>;

export interface ArbitrationDecision {
  query: string;
  processed: ProcessedQuery;
  status: ResolutionStatus;
  /** Accepted or promoted candidate */
  chosen: CandidateResolution | null;
  /** Every other candidate that ran, in run order */
  rejected: CandidateResolution[];
  /** True when no candidate cleared its threshold and a backup was promoted */
  fallbackUsed: boolean;
  command: string | null;
  /** 0-1; 0 when there is no command */
  confidence: number;
  method: ResolutionMethod | null;
  /** Low-confidence notice for fallback decisions */
  warning?: string;
  /** Present for invalid and unresolved decisions */
  error?: string;
}

export interface ResolveOptions {
  restrictTo?: RestrictableMethod;
}

/** One entry of a suggestion list */
export interface Suggestion {
  command: string;
  confidence: number;
  method: ResolutionMethod;
  label?: string;
}
