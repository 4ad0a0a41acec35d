/**
 * Capability interface for an external intent classifier, plus the
 * persisted model format of the bundled Bayes implementation.
 */

import { z } from 'zod';
import type { OsFamily } from '../types/os-family.js';

// ============================================================================
// Capability
// ============================================================================

export interface ClassifierPrediction {
  /** Highest-scoring label */
  label: string;
  /** Confidence of `label`, 0-1 */
  confidence: number;
  /** Normalized confidence per label (sums to ~1) */
  confidencePerLabel: Record<string, number>;
}

/**
 * A classifier predicts an intent label for a normalized query and maps a
 * label to a command for one OS family.
 */
export interface CommandClassifier {
  predict(normalizedQuery: string): ClassifierPrediction | null;
  labelToCommand(label: string, osFamily: OsFamily): string | null;
}

/** One ranked label with the command it maps to */
export interface RankedPrediction {
  label: string;
  confidence: number;
  command: string | null;
}

// ============================================================================
// Persisted Model
// ============================================================================

export const TrainingDocumentSchema = z.object({
  text: z.string(),
  label: z.string().min(1),
});

export type TrainingDocument = z.infer<typeof TrainingDocumentSchema>;

/**
 * Saved classifier: the training documents and the `${os}_${label}` ->
 * command map. Restoring retrains from the documents, which is
 * deterministic.
 */
export const ClassifierModelSchema = z.object({
  version: z.literal(1),
  documents: z.array(TrainingDocumentSchema),
  commands: z.record(z.string(), z.string()),
});

export type ClassifierModel = z.infer<typeof ClassifierModelSchema>;
