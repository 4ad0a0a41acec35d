/**
 * Naive Bayes intent classifier wrapping natural.BayesClassifier.
 *
 * Trained from dataset entries: each query is a document labelled with
 * its intent. Commands are looked up per OS family through a
 * `${os}_${intent}` map; the first record for a key wins.
 */

import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import natural from 'natural';
import type { DatasetEntry } from '../dataset/types.js';
import type { OsFamily } from '../types/os-family.js';
import { ClassifierModelSchema } from './types.js';
import type {
  ClassifierModel,
  ClassifierPrediction,
  CommandClassifier,
  RankedPrediction,
  TrainingDocument,
} from './types.js';

function commandKey(osFamily: OsFamily, label: string): string {
  return `${osFamily}_${label}`;
}

// ============================================================================
// BayesCommandClassifier
// ============================================================================

/**
 * @example
 * ```ts
 * const classifier = BayesCommandClassifier.fromEntries(datasetEntries(dataset));
 * const prediction = classifier.predict('list all files');
 * // => { label: 'list_files', confidence: 0.41, confidencePerLabel: { ... } }
 * classifier.labelToCommand('list_files', 'linux'); // => 'ls -la'
 * ```
 */
export class BayesCommandClassifier implements CommandClassifier {
  private classifier: natural.BayesClassifier;
  private trained: boolean = false;
  private documents: TrainingDocument[] = [];
  private commands: Map<string, string> = new Map();

  constructor() {
    this.classifier = new natural.BayesClassifier();
  }

  static fromEntries(entries: DatasetEntry[]): BayesCommandClassifier {
    const classifier = new BayesCommandClassifier();
    classifier.train(entries);
    return classifier;
  }

  get isTrained(): boolean {
    return this.trained;
  }

  /** Distinct labels seen during training */
  get labels(): string[] {
    return [...new Set(this.documents.map((doc) => doc.label))];
  }

  /**
   * Train on dataset entries, replacing any previous training.
   */
  train(entries: DatasetEntry[]): void {
    const commands = new Map<string, string>();
    for (const entry of entries) {
      const key = commandKey(entry.os, entry.intent);
      if (!commands.has(key)) {
        commands.set(key, entry.command);
      }
    }
    this.fit(
      entries.map((entry) => ({ text: entry.query.toLowerCase(), label: entry.intent })),
      commands,
    );
  }

  private fit(documents: TrainingDocument[], commands: Map<string, string>): void {
    this.classifier = new natural.BayesClassifier();
    this.documents = documents;
    this.commands = commands;
    this.trained = false;

    if (documents.length === 0) return;

    for (const doc of documents) {
      this.classifier.addDocument(doc.text, doc.label);
    }
    this.classifier.train();
    this.trained = true;
  }

  /**
   * Labels ranked by normalized confidence (summing to ~1.0), descending.
   */
  classify(normalizedQuery: string): Array<{ label: string; confidence: number }> {
    if (!this.trained || !normalizedQuery.trim()) {
      return [];
    }

    const raw = this.classifier.getClassifications(normalizedQuery);
    if (raw.length === 0) return [];

    const sum = raw.reduce((acc, r) => acc + r.value, 0);
    const normalized = raw.map((r) => ({
      label: r.label,
      confidence: sum > 0 ? r.value / sum : 0,
    }));

    normalized.sort((a, b) => b.confidence - a.confidence);
    return normalized;
  }

  predict(normalizedQuery: string): ClassifierPrediction | null {
    const ranked = this.classify(normalizedQuery);
    const top = ranked[0];
    if (!top) return null;

    const confidencePerLabel: Record<string, number> = {};
    for (const r of ranked) {
      confidencePerLabel[r.label] = r.confidence;
    }
    return { label: top.label, confidence: top.confidence, confidencePerLabel };
  }

  labelToCommand(label: string, osFamily: OsFamily): string | null {
    return this.commands.get(commandKey(osFamily, label)) ?? null;
  }

  /**
   * The `n` best labels with the command each maps to on `osFamily`.
   */
  topPredictions(normalizedQuery: string, osFamily: OsFamily, n: number = 3): RankedPrediction[] {
    return this.classify(normalizedQuery)
      .slice(0, Math.max(0, n))
      .map((r) => ({ ...r, command: this.labelToCommand(r.label, osFamily) }));
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  toJSON(): ClassifierModel {
    return {
      version: 1,
      documents: this.documents,
      commands: Object.fromEntries(this.commands),
    };
  }

  static fromJSON(model: ClassifierModel): BayesCommandClassifier {
    const classifier = new BayesCommandClassifier();
    classifier.fit(model.documents, new Map(Object.entries(model.commands)));
    return classifier;
  }
}

// ============================================================================
// Model Files
// ============================================================================

/**
 * Write a trained classifier to disk as JSON, creating parent directories.
 */
export function saveModel(classifier: BayesCommandClassifier, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(classifier.toJSON()), 'utf-8');
}

/**
 * Load a saved classifier. A missing or corrupt file is reported on
 * stderr and yields null.
 */
export function loadModel(path: string): BayesCommandClassifier | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[classifier] Unavailable, cannot load model ${path}: ${message}\n`);
    return null;
  }

  const result = ClassifierModelSchema.safeParse(raw);
  if (!result.success) {
    process.stderr.write(`[classifier] Unavailable, model ${path} is invalid\n`);
    return null;
  }
  return BayesCommandClassifier.fromJSON(result.data);
}
