/**
 * Type definitions for command risk assessment and the confirmation gate.
 */

import { z } from 'zod';

// ============================================================================
// Severity
// ============================================================================

/** Ordered most to least severe. */
export const RISK_SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

export const RiskSeveritySchema = z.enum(RISK_SEVERITIES);

export type RiskSeverity = z.infer<typeof RiskSeveritySchema>;

// ============================================================================
// Assessment
// ============================================================================

/**
 * A dangerous construct recognised in a command.
 *
 * `keyword` is the display form shown to the user; `pattern` is what
 * actually fires against the command text.
 */
export interface RiskPattern {
  keyword: string;
  pattern: RegExp;
  severity: RiskSeverity;
  explanation: string;
  alternative: string;
}

export interface RiskMatch {
  keyword: string;
  severity: RiskSeverity;
  explanation: string;
  alternative: string;
}

export interface RiskAssessment {
  isRisky: boolean;
  /** Highest severity among the matches, null when nothing matched */
  severity: RiskSeverity | null;
  matches: RiskMatch[];
  riskCount: number;
}

// ============================================================================
// Gate Decision
// ============================================================================

/** One answer the user must type before a risky command runs. */
export interface ConfirmationStep {
  prompt: string;
  expected: string;
  caseSensitive: boolean;
}

export interface RiskGateDecision {
  /** proceed: run without asking; confirm: walk every step in order */
  action: 'proceed' | 'confirm';
  reason: string;
  severity: RiskSeverity | null;
  assessment: RiskAssessment;
  confirmations: ConfirmationStep[];
}
