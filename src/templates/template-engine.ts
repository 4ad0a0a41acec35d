/**
 * Template engine: turns a QueryAnalysis into a concrete command.
 *
 * Key selection:
 * - version-control intents use the intent name as the key
 * - a nested folder/file operation uses `create_nested`
 * - otherwise `{intent}_{firstTarget}`
 *
 * The first template listed for the key is filled. Version-control
 * templates get defaults for missing placeholders; any other template
 * with an unfilled placeholder yields no command.
 */

import type { TemplateCatalog } from '../dataset/types.js';
import type { OsFamily } from '../types/os-family.js';
import { analyze } from './parameter-extractor.js';
import type { QueryAnalysis, TemplateParameters, TemplateResolution } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Confidence reported for every successfully generated command */
export const TEMPLATE_CONFIDENCE = 0.95;

export const GIT_DEFAULTS: Readonly<TemplateParameters> = {
  message: 'Update',
  branchname: 'new-branch',
  filename: '.',
  url: '',
  branch: 'main',
  tagname: 'v1.0',
  name: 'Your Name',
  email: 'your.email@example.com',
};

const PLACEHOLDER = /\{(\w+)\}/g;

// ============================================================================
// Fill
// ============================================================================

/**
 * Substitute `{name}` placeholders. Returns null when any placeholder has
 * no value.
 *
 * @example
 * ```ts
 * fillTemplate('mv {old_name} {new_name}', { old_name: 'a', new_name: 'b' }); // => 'mv a b'
 * fillTemplate('touch {filename}', {}); // => null
 * ```
 */
export function fillTemplate(template: string, parameters: TemplateParameters): string | null {
  let missing = false;
  const command = template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
    const value = parameters[name];
    if (value === undefined) {
      missing = true;
      return placeholder;
    }
    return value;
  });
  return missing ? null : command;
}

/**
 * Template key for an analysis, or null when it has no intent or no target.
 */
export function templateKey(analysis: QueryAnalysis): string | null {
  const { intent, targets, nested } = analysis;
  if (!intent) return null;
  if (intent.startsWith('git_')) return intent;
  if (nested) return 'create_nested';

  const firstTarget = targets[0];
  if (!firstTarget) return null;

  return `${intent}_${firstTarget}`;
}

function withDefaults(key: string, parameters: TemplateParameters): TemplateParameters {
  return key.startsWith('git_') ? { ...GIT_DEFAULTS, ...parameters } : parameters;
}

// ============================================================================
// TemplateEngine
// ============================================================================

export class TemplateEngine {
  constructor(private readonly catalog: TemplateCatalog) {}

  /** Templates for a key on one family (shared templates apply to both) */
  templatesFor(key: string, osFamily: OsFamily): readonly string[] {
    return this.catalog[osFamily][key] ?? this.catalog.shared[key] ?? [];
  }

  /**
   * Generate a command from a template key and parameters.
   */
  generateCommand(key: string, parameters: TemplateParameters, osFamily: OsFamily): string | null {
    const template = this.templatesFor(key, osFamily)[0];
    if (template === undefined) return null;

    return fillTemplate(template, withDefaults(key, parameters));
  }

  /**
   * Generate a command from a full analysis.
   */
  generate(analysis: QueryAnalysis, osFamily: OsFamily): TemplateResolution | null {
    const key = templateKey(analysis);
    if (!key || !analysis.intent) return null;

    const command = this.generateCommand(key, analysis.parameters, osFamily);
    if (command === null) return null;

    return {
      command,
      templateKey: key,
      intent: analysis.intent,
      targets: analysis.targets,
      parameters: withDefaults(key, analysis.parameters),
      nested: analysis.nested,
      confidence: TEMPLATE_CONFIDENCE,
    };
  }

  /**
   * Analyze and generate in one step.
   *
   * @example
   * ```ts
   * engine.resolve('create a folder named proj', 'linux')?.command; // => 'mkdir proj'
   * ```
   */
  resolve(query: string, osFamily: OsFamily): TemplateResolution | null {
    return this.generate(analyze(query), osFamily);
  }
}
