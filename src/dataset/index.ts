/**
 * Curated data module: schemas and fail-closed loaders.
 */

export {
  CommandRecordSchema,
  CommandDatasetSchema,
  TemplateTableSchema,
  TemplateCatalogSchema,
  DiagnosisEntrySchema,
  DiagnosisCategorySchema,
  DiagnosisCatalogSchema,
  KeywordRuleSchema,
  RuleTableSchema,
} from './types.js';
export type {
  CommandRecord,
  CommandDataset,
  DatasetEntry,
  TemplateTable,
  TemplateCatalog,
  DiagnosisEntry,
  DiagnosisCategory,
  DiagnosisCatalog,
  KeywordRule,
  RuleTable,
} from './types.js';

export {
  DATA_DIR,
  DEFAULT_DATASET_PATH,
  DEFAULT_TEMPLATES_PATH,
  DEFAULT_DIAGNOSIS_PATH,
  DEFAULT_RULES_PATH,
  readJsonSource,
  loadDataset,
  loadTemplates,
  loadDiagnosisCatalog,
  loadRuleTable,
  datasetEntries,
} from './dataset-loader.js';
