/**
 * In-process stand-ins for the arbitrator's collaborators.
 */

import { vi } from 'vitest';
import type { ClassifierPrediction } from '../classifier/types.js';
import type { SmartSearchResult } from '../matching/approximate-matcher.js';
import type { TemplateResolution } from '../templates/types.js';
import type { OsFamily } from '../types/os-family.js';

export function prediction(label: string, confidence: number): ClassifierPrediction {
  return { label, confidence, confidencePerLabel: { [label]: confidence } };
}

export function stubClassifier(result: ClassifierPrediction | null, command: string | null) {
  return {
    predict: vi.fn((_normalizedQuery: string): ClassifierPrediction | null => result),
    labelToCommand: vi.fn((_label: string, _osFamily: OsFamily): string | null => command),
  };
}

export function templateResolution(command: string): TemplateResolution {
  return {
    command,
    templateKey: 'create_folder',
    intent: 'create',
    targets: ['folder'],
    parameters: {},
    nested: null,
    confidence: 0.95,
  };
}

export function stubTemplates(result: TemplateResolution | null) {
  return {
    resolve: vi.fn((_query: string, _osFamily: OsFamily): TemplateResolution | null => result),
  };
}

export function similarityResult(command: string, confidence: number): SmartSearchResult {
  return {
    matches: [],
    diagnoses: [],
    best: { source: 'fuzzy_match', command, intent: 'stub', matchedQuery: 'stub query', os: 'linux' },
    confidence,
  };
}

export const EMPTY_SEARCH: SmartSearchResult = { matches: [], diagnoses: [], best: null, confidence: 0 };

export function stubMatcher(result: SmartSearchResult) {
  return {
    smartSearch: vi.fn((_query: string, _osFamily: OsFamily): SmartSearchResult => result),
  };
}

export function stubRules(command: string | ((query: string) => string)) {
  return {
    match: vi.fn((query: string, _osFamily: OsFamily): string =>
      typeof command === 'function' ? command(query) : command,
    ),
  };
}

export const PLACEHOLDER = 'echo "Command not recognized: stub"';
