/**
 * Type definitions for the parameter/template resolver.
 *
 * A QueryAnalysis is what analyze() reads out of a query: the intent, the
 * action verb that triggered it, every target type mentioned, named
 * parameters and an optional nested folder/file operation. The template
 * engine turns an analysis into a concrete command for one OS family.
 */

import { z } from 'zod';

// ============================================================================
// Targets
// ============================================================================

export const TargetTypeSchema = z.enum(['file', 'folder', 'process', 'service', 'user']);

export type TargetType = z.infer<typeof TargetTypeSchema>;

// ============================================================================
// Parameters
// ============================================================================

/**
 * Named values that fill template placeholders.
 *
 * Keys match placeholder names in data/templates.json
 * (`{filename}`, `{old_name}`, `{branchname}`, ...).
 */
export type TemplateParameters = Record<string, string>;

// ============================================================================
// Nested Operation
// ============================================================================

/** "folder X with file Y" or "file Y in folder X" */
export interface NestedOperation {
  parent: { type: 'folder'; name: string };
  child: { type: 'file'; name: string };
}

// ============================================================================
// Analysis
// ============================================================================

export interface QueryAnalysis {
  query: string;
  /** Intent label (`create`, `kill`, `git_push`, ...) or null when none was found */
  intent: string | null;
  /** Verb that triggered the intent (`git` for version-control intents) */
  action: string | null;
  /** Every target type mentioned, in table order */
  targets: TargetType[];
  parameters: TemplateParameters;
  nested: NestedOperation | null;
}

// ============================================================================
// Generation Result
// ============================================================================

export interface TemplateResolution {
  command: string;
  templateKey: string;
  intent: string;
  targets: TargetType[];
  /** Parameters after defaults were applied */
  parameters: TemplateParameters;
  nested: NestedOperation | null;
  confidence: number;
}
