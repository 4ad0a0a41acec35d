/**
 * Resolver context: everything one process needs to resolve queries,
 * built once from configuration and curated data.
 *
 * Each data source loads fail-closed. A missing dataset, template table,
 * diagnosis catalog, rule table or model disables the stages that need it
 * and the rest of the cascade keeps working.
 */

import { loadConfig, ResolverConfigSchema } from './config/index.js';
import type { ResolverConfig } from './config/index.js';
import {
  datasetEntries,
  loadDataset,
  loadDiagnosisCatalog,
  loadRuleTable,
  loadTemplates,
} from './dataset/index.js';
import type { DatasetEntry } from './dataset/index.js';
import { BayesCommandClassifier, loadModel } from './classifier/index.js';
import { ApproximateMatcher } from './matching/index.js';
import { TemplateEngine } from './templates/index.js';
import { TableRuleMatcher } from './rules/index.js';
import { ConfigError, ResolutionArbitrator, ResolutionLogger } from './resolver/index.js';
import { MultiCommandOrchestrator } from './chain/index.js';
import { detectOsFamily } from './types/os-family.js';
import type { OsFamily } from './types/os-family.js';

// ============================================================================
// Types
// ============================================================================

export interface ResolverContextOptions {
  /** Config file to read (defaults to nlcmd.config.json in the working directory) */
  configPath?: string;
  /** Values applied over the config file, validated the same way */
  overrides?: Partial<ResolverConfig>;
}

/** The approximate-matching slice of a context; loads no classifier */
export interface MatcherContext {
  config: ResolverConfig;
  osFamily: OsFamily;
  /** Null when neither the dataset nor the diagnosis catalog loaded */
  matcher: ApproximateMatcher | null;
  /** Flattened dataset, empty when the dataset is unavailable */
  entries: DatasetEntry[];
}

export interface ResolverContext extends MatcherContext {
  arbitrator: ResolutionArbitrator;
  multiCommand: MultiCommandOrchestrator;
  /** Null when no logDir is configured */
  logger: ResolutionLogger | null;
  classifier: BayesCommandClassifier | null;
}

// ============================================================================
// Builders
// ============================================================================

function applyOverrides(config: ResolverConfig, overrides: Partial<ResolverConfig> | undefined): ResolverConfig {
  if (!overrides) return config;

  const result = ResolverConfigSchema.safeParse({ ...config, ...overrides });
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.');
    throw new ConfigError(`Invalid option ${field ?? ''}: ${issue?.message ?? 'validation failed'}`, field);
  }
  return result.data;
}

/**
 * Classifier per config: a saved model when one is configured and loads,
 * otherwise one trained from the dataset, otherwise none.
 */
export function buildClassifier(config: ResolverConfig, entries: DatasetEntry[]): BayesCommandClassifier | null {
  if (config.classifier === 'none') return null;

  if (config.modelPath) {
    const saved = loadModel(config.modelPath);
    if (saved) return saved;
  }

  if (entries.length === 0) {
    process.stderr.write('[classifier] Unavailable, no training data\n');
    return null;
  }
  return BayesCommandClassifier.fromEntries(entries);
}

/**
 * Load configuration, dataset and diagnosis catalog, and build the
 * approximate matcher over them.
 *
 * @throws {ConfigError} When the config file or overrides are invalid
 */
export async function createMatcherContext(options: ResolverContextOptions = {}): Promise<MatcherContext> {
  const config = applyOverrides(await loadConfig(options.configPath), options.overrides);
  const osFamily = config.osFamily ?? detectOsFamily();

  const dataset = loadDataset(config.datasetPath);
  const entries = dataset ? datasetEntries(dataset) : [];
  const diagnosis = loadDiagnosisCatalog();

  const matcher =
    entries.length > 0 || diagnosis
      ? new ApproximateMatcher(entries, diagnosis, {
          similarityThreshold: config.similarityThreshold,
          similarityLimit: config.similarityLimit,
          strongSimilarity: config.strongSimilarity,
          diagnosisMinRelevance: config.diagnosisMinRelevance,
        })
      : null;

  return { config, osFamily, matcher, entries };
}

/**
 * Load configuration and data, then wire the arbitrator, chain
 * orchestrator and audit logger.
 *
 * @throws {ConfigError} When the config file or overrides are invalid
 */
export async function createResolverContext(options: ResolverContextOptions = {}): Promise<ResolverContext> {
  const base = await createMatcherContext(options);
  const { config, osFamily, matcher, entries } = base;

  const templates = loadTemplates();
  const rules = loadRuleTable();
  const classifier = buildClassifier(config, entries);

  const arbitrator = new ResolutionArbitrator(
    {
      classifier,
      templates: templates ? new TemplateEngine(templates) : null,
      matcher,
      rules: rules ? new TableRuleMatcher(rules) : null,
    },
    osFamily,
    {
      mlThreshold: config.mlThreshold,
      templateThreshold: config.templateThreshold,
      fuzzyThreshold: config.fuzzyThreshold,
    },
  );

  return {
    ...base,
    arbitrator,
    multiCommand: new MultiCommandOrchestrator(arbitrator),
    logger: config.logDir ? new ResolutionLogger(config.logDir) : null,
    classifier,
  };
}
