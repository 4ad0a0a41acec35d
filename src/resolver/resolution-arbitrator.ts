/**
 * Resolution arbitrator: runs the strategy cascade for one query.
 *
 * Stages, in order, each returning early when accepted:
 * 1. Classifier: accepted at confidence >= mlThreshold
 * 2. Templates: accepted at confidence >= templateThreshold
 * 3. Approximate match / diagnosis: accepted at >= fuzzyThreshold
 * 4. Rules: accepted whenever a real command (not the placeholder) comes back
 *
 * When nothing is accepted, the higher-confidence of the classifier and
 * approximate backups that carry a command is promoted as a fallback
 * with a low-confidence warning. The classifier withholds its command
 * below mlThreshold, so in practice only an approximate match is
 * promoted. Template backups never enter the pool: a generated command
 * always reports a confidence above its threshold, so a template backup
 * is always a failure.
 */

import { normalize } from '../query/query-normalizer.js';
import type { CommandClassifier } from '../classifier/types.js';
import type { RuleMatcher } from '../rules/rule-matcher.js';
import type { OsFamily } from '../types/os-family.js';
import { InvalidInputError, NoResolutionError } from './errors.js';
import {
  approximateStrategy,
  classifierStrategy,
  invokeStrategy,
  ruleStrategy,
  templateStrategy,
} from './strategy.js';
import type { ApproximateSearch, ResolutionStrategy, TemplateResolver } from './strategy.js';
import type {
  ArbitrationDecision,
  CandidateResolution,
  ResolveOptions,
  RestrictableMethod,
  StrategyStage,
  Suggestion,
} from './types.js';

// ============================================================================
// Options
// ============================================================================

/** Optional collaborators; a missing one disables its stage */
export interface ArbitratorCollaborators {
  classifier?: CommandClassifier | null;
  templates?: TemplateResolver | null;
  matcher?: ApproximateSearch | null;
  rules?: RuleMatcher | null;
}

export interface ArbitratorThresholds {
  mlThreshold: number;
  templateThreshold: number;
  fuzzyThreshold: number;
}

export const DEFAULT_THRESHOLDS: ArbitratorThresholds = {
  mlThreshold: 0.6,
  templateThreshold: 0.9,
  fuzzyThreshold: 0.75,
};

/** Stages skipped for each restriction */
const SKIPPED_STAGES: Record<RestrictableMethod, ReadonlySet<StrategyStage>> = {
  ml: new Set(['fuzzy', 'rule']),
  fuzzy: new Set(['ml', 'rule']),
  rule: new Set(['ml', 'fuzzy']),
};

/**
 * User-facing warning for a promoted fallback.
 *
 * @example
 * ```ts
 * lowConfidenceWarning(0.456); // => 'Low confidence (45.6%), please verify'
 * ```
 */
export function lowConfidenceWarning(confidence: number): string {
  return `Low confidence (${(confidence * 100).toFixed(1)}%), please verify`;
}

// ============================================================================
// ResolutionArbitrator
// ============================================================================

export class ResolutionArbitrator {
  private readonly classifier: CommandClassifier | null;
  private readonly strategies: Record<StrategyStage, ResolutionStrategy | null>;
  private readonly thresholds: ArbitratorThresholds;

  constructor(
    collaborators: ArbitratorCollaborators,
    readonly osFamily: OsFamily,
    thresholds: Partial<ArbitratorThresholds> = {},
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.classifier = collaborators.classifier ?? null;
    this.strategies = {
      ml: collaborators.classifier ? classifierStrategy(collaborators.classifier, this.thresholds.mlThreshold) : null,
      template: collaborators.templates ? templateStrategy(collaborators.templates) : null,
      fuzzy: collaborators.matcher ? approximateStrategy(collaborators.matcher) : null,
      rule: collaborators.rules ? ruleStrategy(collaborators.rules) : null,
    };
  }

  /** Stages whose collaborator is loaded */
  get availableStages(): StrategyStage[] {
    return (['ml', 'template', 'fuzzy', 'rule'] as const).filter((stage) => this.strategies[stage] !== null);
  }

  /**
   * Resolve one query to a decision.
   *
   * @example
   * ```ts
   * const decision = arbitrator.resolve('create a folder named proj');
   * // => { status: 'resolved', command: 'mkdir proj', method: 'template', confidence: 0.95, ... }
   * ```
   */
  resolve(query: string, options: ResolveOptions = {}): ArbitrationDecision {
    const processed = normalize(query);
    const base = { query, processed };

    if (!processed.isValid) {
      return {
        ...base,
        status: 'invalid',
        chosen: null,
        rejected: [],
        fallbackUsed: false,
        command: null,
        confidence: 0,
        method: null,
        error: new InvalidInputError().message,
      };
    }

    const skipped = options.restrictTo ? SKIPPED_STAGES[options.restrictTo] : new Set<StrategyStage>();
    const ran: CandidateResolution[] = [];
    const backups: CandidateResolution[] = [];

    const accept = (chosen: CandidateResolution): ArbitrationDecision => ({
      ...base,
      status: 'resolved',
      chosen,
      rejected: ran.filter((candidate) => candidate !== chosen),
      fallbackUsed: false,
      command: chosen.command,
      confidence: chosen.confidence,
      method: chosen.method,
    });

    const stages: Array<[StrategyStage, number]> = [
      ['ml', this.thresholds.mlThreshold],
      ['template', this.thresholds.templateThreshold],
      ['fuzzy', this.thresholds.fuzzyThreshold],
      ['rule', 0],
    ];

    for (const [stage, threshold] of stages) {
      if (skipped.has(stage)) continue;

      const outcome = invokeStrategy(stage, this.strategies[stage], query, processed, this.osFamily);
      if (outcome.status === 'unavailable') continue;

      const candidate = outcome.candidate;
      ran.push(candidate);
      if (candidate.succeeded && candidate.command && candidate.confidence >= threshold) {
        return accept(candidate);
      }
      if (stage === 'ml' || stage === 'fuzzy') {
        backups.push(candidate);
      }
    }

    const pool = backups.filter((candidate) => candidate.command);
    const promoted = pool.reduce<CandidateResolution | null>(
      (best, candidate) => (!best || candidate.confidence > best.confidence ? candidate : best),
      null,
    );

    if (promoted) {
      return {
        ...base,
        status: 'fallback',
        chosen: promoted,
        rejected: ran.filter((candidate) => candidate !== promoted),
        fallbackUsed: true,
        command: promoted.command,
        confidence: promoted.confidence,
        method: promoted.method,
        warning: lowConfidenceWarning(promoted.confidence),
      };
    }

    return {
      ...base,
      status: 'unresolved',
      chosen: null,
      rejected: ran,
      fallbackUsed: false,
      command: null,
      confidence: 0,
      method: null,
      error: new NoResolutionError().message,
    };
  }

  /**
   * Alternative commands for a query: the rule hit first (confidence 1),
   * then the classifier's ranked labels that map to a command. Duplicate
   * commands are dropped.
   */
  suggest(query: string, n: number = 3): Suggestion[] {
    const processed = normalize(query);
    if (!processed.isValid || n <= 0) return [];

    const suggestions: Suggestion[] = [];
    const seen = new Set<string>();
    const add = (suggestion: Suggestion): void => {
      if (seen.has(suggestion.command)) return;
      seen.add(suggestion.command);
      suggestions.push(suggestion);
    };

    const rule = this.strategies.rule
      ? invokeStrategy('rule', this.strategies.rule, query, processed, this.osFamily)
      : null;
    if (rule?.status === 'ran' && rule.candidate.command) {
      add({ command: rule.candidate.command, confidence: 1, method: 'rule' });
    }

    if (this.classifier) {
      for (const { label, confidence, command } of this.rankLabels(this.classifier, processed.normalized)) {
        if (command) add({ command, confidence, method: 'ml', label });
      }
    }

    return suggestions.slice(0, n);
  }

  private rankLabels(
    classifier: CommandClassifier,
    normalizedQuery: string,
  ): Array<{ label: string; confidence: number; command: string | null }> {
    try {
      const prediction = classifier.predict(normalizedQuery);
      if (!prediction) return [];
      return Object.entries(prediction.confidencePerLabel)
        .sort((a, b) => b[1] - a[1])
        .map(([label, confidence]) => ({
          label,
          confidence,
          command: classifier.labelToCommand(label, this.osFamily),
        }));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[resolver] Suggestions from the classifier failed: ${message}\n`);
      return [];
    }
  }
}
