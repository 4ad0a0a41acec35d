/**
 * Strategy boundary: adapters that turn each collaborator's native
 * output into a CandidateResolution, and the wrapper that keeps faults
 * from crossing into the arbitrator.
 *
 * A strategy either ran (and produced a candidate, possibly a failed
 * one) or was unavailable because its collaborator is not loaded.
 * Nothing here throws.
 */

import type { CommandClassifier } from '../classifier/types.js';
import type { SmartSearchResult } from '../matching/approximate-matcher.js';
import type { ProcessedQuery } from '../query/types.js';
import { isNoOpPlaceholder } from '../rules/rule-matcher.js';
import type { RuleMatcher } from '../rules/rule-matcher.js';
import type { TemplateResolution } from '../templates/types.js';
import type { OsFamily } from '../types/os-family.js';
import { StrategyError, StrategyUnavailableError } from './errors.js';
import type { CandidateResolution, ResolutionMethod, StrategyStage } from './types.js';

// ============================================================================
// Types
// ============================================================================

/** One stage of the cascade */
export interface ResolutionStrategy {
  readonly stage: StrategyStage;
  resolve(query: string, processed: ProcessedQuery, osFamily: OsFamily): CandidateResolution;
}

export type StrategyOutcome =
  | { status: 'unavailable'; error: StrategyUnavailableError }
  | { status: 'ran'; candidate: CandidateResolution };

/** Anything that can generate a command from a template */
export interface TemplateResolver {
  resolve(query: string, osFamily: OsFamily): TemplateResolution | null;
}

/** Anything that can run a combined similarity + diagnosis search */
export interface ApproximateSearch {
  smartSearch(query: string, osFamily: OsFamily): SmartSearchResult;
}

// ============================================================================
// Boundary
// ============================================================================

/**
 * Candidate for a strategy that produced no command.
 */
export function failedCandidate(
  method: ResolutionMethod,
  error: string,
  metadata: Record<string, unknown> = {},
): CandidateResolution {
  return { method, command: null, confidence: 0, succeeded: false, error, metadata };
}

/**
 * Run a strategy body, converting a thrown fault into a failed candidate.
 */
export function runStrategy(method: ResolutionMethod, fn: () => CandidateResolution): CandidateResolution {
  try {
    return fn();
  } catch (err: unknown) {
    return failedCandidate(method, new StrategyError(method, err).message);
  }
}

/**
 * Invoke an optional strategy.
 */
export function invokeStrategy(
  stage: StrategyStage,
  strategy: ResolutionStrategy | null,
  query: string,
  processed: ProcessedQuery,
  osFamily: OsFamily,
): StrategyOutcome {
  if (!strategy) {
    return { status: 'unavailable', error: new StrategyUnavailableError(stage) };
  }
  return {
    status: 'ran',
    candidate: runStrategy(stage, () => strategy.resolve(query, processed, osFamily)),
  };
}

// ============================================================================
// Adapters
// ============================================================================

/**
 * Classifier stage. Succeeds when the predicted label maps to a command
 * on the OS family and its confidence reaches `minConfidence`. A weaker
 * prediction fails without a command, so it can never be promoted as a
 * fallback.
 */
export function classifierStrategy(classifier: CommandClassifier, minConfidence: number = 0): ResolutionStrategy {
  return {
    stage: 'ml',
    resolve(_query, processed, osFamily) {
      const prediction = classifier.predict(processed.normalized);
      if (!prediction) {
        return failedCandidate('ml', 'No prediction');
      }

      const metadata = { label: prediction.label, confidencePerLabel: prediction.confidencePerLabel };
      if (prediction.confidence < minConfidence) {
        return {
          ...failedCandidate('ml', `Prediction "${prediction.label}" below confidence threshold`, metadata),
          confidence: prediction.confidence,
        };
      }

      const command = classifier.labelToCommand(prediction.label, osFamily);
      if (!command) {
        return failedCandidate('ml', `No ${osFamily} command for intent "${prediction.label}"`, metadata);
      }

      return {
        method: 'ml',
        command,
        confidence: prediction.confidence,
        succeeded: true,
        explanation: `Predicted intent "${prediction.label}"`,
        metadata,
      };
    },
  };
}

export function templateStrategy(templates: TemplateResolver): ResolutionStrategy {
  return {
    stage: 'template',
    resolve(query, _processed, osFamily) {
      const resolution = templates.resolve(query, osFamily);
      if (!resolution) {
        return failedCandidate('template', 'No template matched');
      }

      return {
        method: 'template',
        command: resolution.command,
        confidence: resolution.confidence,
        succeeded: true,
        explanation: `Generated from template "${resolution.templateKey}"`,
        metadata: {
          templateKey: resolution.templateKey,
          intent: resolution.intent,
          targets: resolution.targets,
          parameters: resolution.parameters,
          nested: resolution.nested,
        },
      };
    },
  };
}

/**
 * Approximate stage: similarity search and problem diagnosis, with
 * smartSearch's 0-100 confidence scaled to 0-1.
 */
export function approximateStrategy(matcher: ApproximateSearch): ResolutionStrategy {
  return {
    stage: 'fuzzy',
    resolve(query, _processed, osFamily) {
      const result = matcher.smartSearch(query, osFamily);
      const metadata = { matchCount: result.matches.length, diagnosisCount: result.diagnoses.length };
      const best = result.best;
      if (!best) {
        return failedCandidate('fuzzy', 'No similar query or known problem', metadata);
      }

      const confidence = result.confidence / 100;
      if (best.source === 'problem_diagnosis') {
        return {
          method: 'problem_diagnosis',
          command: best.command,
          confidence,
          succeeded: true,
          explanation: best.explanation,
          metadata: { ...metadata, category: best.category, problem: best.problem },
        };
      }

      return {
        method: 'fuzzy',
        command: best.command,
        confidence,
        succeeded: true,
        explanation: `Similar to "${best.matchedQuery}"`,
        metadata: { ...metadata, matchedQuery: best.matchedQuery, intent: best.intent },
      };
    },
  };
}

/**
 * Rule stage. Deterministic hits report confidence 1; the no-op
 * placeholder becomes a failed candidate.
 */
export function ruleStrategy(rules: RuleMatcher): ResolutionStrategy {
  return {
    stage: 'rule',
    resolve(query, _processed, osFamily) {
      const command = rules.match(query, osFamily);
      if (isNoOpPlaceholder(command)) {
        return failedCandidate('rule', 'No rule matched', { placeholder: command });
      }
      return {
        method: 'rule',
        command,
        confidence: 1,
        succeeded: true,
        explanation: 'Matched a built-in rule',
        metadata: {},
      };
    },
  };
}
