/**
 * Zod schemas for the curated data files under data/.
 *
 * - commands.json: known query -> command records per OS family
 * - templates.json: OS-specific command templates with named placeholders
 * - diagnosis.json: troubleshooting catalog grouped by problem category
 * - rules.json: deterministic keyword rules for the exact rule matcher
 */

import { z } from 'zod';
import type { OsFamily } from '../types/os-family.js';

// ============================================================================
// Command Dataset
// ============================================================================

export const CommandRecordSchema = z.object({
  query: z.string().min(1),
  intent: z.string().min(1),
  command: z.string().min(1),
});

export type CommandRecord = z.infer<typeof CommandRecordSchema>;

/**
 * Records per OS family. `git` records are cross-platform and apply to
 * both families.
 */
export const CommandDatasetSchema = z.object({
  windows: z.array(CommandRecordSchema).default([]),
  linux: z.array(CommandRecordSchema).default([]),
  git: z.array(CommandRecordSchema).default([]),
});

export type CommandDataset = z.infer<typeof CommandDatasetSchema>;

/** A dataset record tagged with the OS family it applies to */
export interface DatasetEntry extends CommandRecord {
  os: OsFamily;
}

// ============================================================================
// Templates
// ============================================================================

/** Template key -> ordered list of literal templates (first is used) */
export const TemplateTableSchema = z.record(z.string(), z.array(z.string()).min(1));

export type TemplateTable = z.infer<typeof TemplateTableSchema>;

export const TemplateCatalogSchema = z.object({
  /** Templates identical on every family (version control) */
  shared: TemplateTableSchema.default({}),
  windows: TemplateTableSchema.default({}),
  linux: TemplateTableSchema.default({}),
});

export type TemplateCatalog = z.infer<typeof TemplateCatalogSchema>;

// ============================================================================
// Diagnosis Catalog
// ============================================================================

export const DiagnosisEntrySchema = z.object({
  problem: z.string().min(1),
  solution: z.string().min(1),
  explanation: z.string(),
});

export type DiagnosisEntry = z.infer<typeof DiagnosisEntrySchema>;

export const DiagnosisCategorySchema = z.object({
  category: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  windows: z.array(DiagnosisEntrySchema).default([]),
  linux: z.array(DiagnosisEntrySchema).default([]),
});

export type DiagnosisCategory = z.infer<typeof DiagnosisCategorySchema>;

export const DiagnosisCatalogSchema = z.object({
  categories: z.array(DiagnosisCategorySchema),
});

export type DiagnosisCatalog = z.infer<typeof DiagnosisCatalogSchema>;

// ============================================================================
// Rule Table
// ============================================================================

export const KeywordRuleSchema = z.object({
  /** Every keyword must occur as a word in the normalized query */
  keywords: z.array(z.string().min(1)).min(1),
  command: z.string().min(1),
});

export type KeywordRule = z.infer<typeof KeywordRuleSchema>;

export const RuleTableSchema = z.object({
  windows: z.array(KeywordRuleSchema).default([]),
  linux: z.array(KeywordRuleSchema).default([]),
});

export type RuleTable = z.infer<typeof RuleTableSchema>;
