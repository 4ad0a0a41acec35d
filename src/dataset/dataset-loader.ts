/**
 * Loaders for the curated data files.
 *
 * All loading is synchronous and happens once, when the resolver context
 * is built. Loading fails closed: a missing or invalid file is reported
 * on stderr and yields null, and the strategy that needed it is disabled.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import type { OsFamily } from '../types/os-family.js';
import {
  CommandDatasetSchema,
  TemplateCatalogSchema,
  DiagnosisCatalogSchema,
  RuleTableSchema,
} from './types.js';
import type {
  CommandDataset,
  DatasetEntry,
  TemplateCatalog,
  DiagnosisCatalog,
  RuleTable,
} from './types.js';

// ============================================================================
// Default Locations
// ============================================================================

/** Directory holding the bundled data files */
export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const DEFAULT_DATASET_PATH = `${DATA_DIR}commands.json`;
export const DEFAULT_TEMPLATES_PATH = `${DATA_DIR}templates.json`;
export const DEFAULT_DIAGNOSIS_PATH = `${DATA_DIR}diagnosis.json`;
export const DEFAULT_RULES_PATH = `${DATA_DIR}rules.json`;

// ============================================================================
// Generic Reader
// ============================================================================

/**
 * Read and validate a JSON file, returning null on any failure.
 *
 * @param path - File to read
 * @param schema - Zod schema the content must satisfy
 * @param label - Component name used as the stderr prefix
 */
export function readJsonSource<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  label: string,
): z.output<S> | null {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[${label}] Unavailable, cannot read ${path}: ${message}\n`);
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    process.stderr.write(`[${label}] Unavailable, ${path} is not valid JSON\n`);
    return null;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'schema mismatch';
    process.stderr.write(`[${label}] Unavailable, ${path} is invalid (${where})\n`);
    return null;
  }

  return result.data;
}

// ============================================================================
// Loaders
// ============================================================================

export function loadDataset(path: string = DEFAULT_DATASET_PATH): CommandDataset | null {
  return readJsonSource(path, CommandDatasetSchema, 'dataset');
}

export function loadTemplates(path: string = DEFAULT_TEMPLATES_PATH): TemplateCatalog | null {
  return readJsonSource(path, TemplateCatalogSchema, 'templates');
}

export function loadDiagnosisCatalog(path: string = DEFAULT_DIAGNOSIS_PATH): DiagnosisCatalog | null {
  return readJsonSource(path, DiagnosisCatalogSchema, 'diagnosis');
}

export function loadRuleTable(path: string = DEFAULT_RULES_PATH): RuleTable | null {
  return readJsonSource(path, RuleTableSchema, 'rules');
}

// ============================================================================
// Flattening
// ============================================================================

/**
 * Flatten a dataset into OS-tagged entries.
 *
 * Order: windows records, linux records, then each git record expanded
 * to windows and linux. When `osFamily` is given only that family's
 * entries are returned.
 */
export function datasetEntries(dataset: CommandDataset, osFamily?: OsFamily): DatasetEntry[] {
  const entries: DatasetEntry[] = [
    ...dataset.windows.map((record) => ({ ...record, os: 'windows' as const })),
    ...dataset.linux.map((record) => ({ ...record, os: 'linux' as const })),
  ];

  for (const record of dataset.git) {
    entries.push({ ...record, os: 'windows' });
    entries.push({ ...record, os: 'linux' });
  }

  return osFamily ? entries.filter((entry) => entry.os === osFamily) : entries;
}
