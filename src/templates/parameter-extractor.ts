/**
 * Parameter extractor: reads intent, targets, named parameters and nested
 * folder/file operations out of a natural-language query.
 *
 * Every table here is declarative ({ pattern, extract } records) and is
 * walked by the generic loops in query/pattern-rules.ts:
 *
 * 1. Version-control patterns are checked first; the first hit fixes the
 *    intent and skips generic intent and target detection.
 * 2. Generic intents: the first verb found (word boundary) decides.
 * 3. Targets: every target type with a matching synonym is collected.
 * 4. Parameters: each family contributes its first match.
 * 5. Nested operations: first matching form wins.
 */

import { captureRule, constantRule, containsWord, firstMatch, matchFamilies } from '../query/pattern-rules.js';
import type { PatternRule, RuleFamily } from '../query/pattern-rules.js';
import type { NestedOperation, QueryAnalysis, TargetType, TemplateParameters } from './types.js';

// ============================================================================
// Version-Control Intents
// ============================================================================

/** Ordered: earlier entries win. Matched against the lowercased query. */
export const GIT_INTENT_RULES: ReadonlyArray<PatternRule<string>> = [
  constantRule(/\b(git\s+status|check\s+git\s+status|show\s+git\s+status|see\s+git\s+changes)\b/, 'git_status'),
  constantRule(/\b(git\s+init|initialize\s+git|create\s+git\s+repo|start\s+git)\b/, 'git_init'),
  constantRule(/\b(git\s+add\s+all|stage\s+all|add\s+everything\s+to\s+git|git\s+add\s+\.|add\s+all\s+files\s+to\s+git)/, 'git_add_all'),
  constantRule(/\b(commit\s+(the\s+)?changes|git\s+commit|make\s+a\s+commit|save\s+changes\s+to\s+git|commit\s+all)\b/, 'git_commit'),
  constantRule(/\b(git\s+push|push\s+to\s+github|push\s+changes|upload\s+to\s+github|push\s+to\s+remote)\b/, 'git_push'),
  constantRule(/\b(git\s+pull|pull\s+from\s+github|pull\s+changes|get\s+latest|sync\s+with\s+github)\b/, 'git_pull'),
  constantRule(/\b(git\s+clone|clone\s+repo|download\s+repo|copy\s+repository)\b/, 'git_clone'),
  constantRule(/\b(create\s+(a\s+)?(new\s+)?branch|make\s+(a\s+)?(new\s+)?branch|add\s+(a\s+)?branch|new\s+branch)\b/, 'git_create_branch'),
  constantRule(/\b(switch\s+branch|change\s+branch|checkout\s+branch|go\s+to\s+branch)\b/, 'git_checkout'),
  constantRule(/\b(list\s+branches|show\s+(all\s+)?branches|see\s+branches|git\s+branch$)/, 'git_list_branches'),
  constantRule(/\b(merge\s+branch|git\s+merge|combine\s+branches)\b/, 'git_merge'),
  constantRule(/\b(git\s+log|show\s+commit\s+history|view\s+commit\s+log|see\s+git\s+history)\b/, 'git_log'),
  constantRule(/\b(git\s+diff|show\s+file\s+changes|see\s+differences|what\s+changed)\b/, 'git_diff'),
  constantRule(/\b(git\s+stash|stash\s+changes|save\s+work\s+in\s+progress)\b/, 'git_stash'),
  constantRule(/\b(git\s+fetch|fetch\s+from\s+remote|get\s+remote\s+changes)\b/, 'git_fetch'),
  constantRule(/\b(list\s+remotes|show\s+remote\s+repositories|git\s+remote\s+-v)/, 'git_list_remotes'),
];

// ============================================================================
// Generic Intents and Targets
// ============================================================================

/** Ordered: the first intent with a verb present wins. */
export const INTENT_VERBS: ReadonlyArray<{ intent: string; verbs: readonly string[] }> = [
  { intent: 'create', verbs: ['create', 'make', 'new', 'add', 'generate'] },
  { intent: 'delete', verbs: ['delete', 'remove', 'del', 'rm', 'erase'] },
  { intent: 'rename', verbs: ['rename', 'move', 'mv'] },
  { intent: 'copy', verbs: ['copy', 'cp', 'duplicate'] },
  { intent: 'list', verbs: ['list', 'show', 'display', 'ls', 'dir'] },
  { intent: 'find', verbs: ['find', 'search', 'locate'] },
  { intent: 'kill', verbs: ['kill', 'stop', 'terminate', 'close'] },
  { intent: 'start', verbs: ['start', 'run', 'launch', 'open'] },
  { intent: 'modify', verbs: ['edit', 'modify', 'change', 'update'] },
];

/** Every target with a synonym present is collected, in this order. */
export const TARGET_SYNONYMS: ReadonlyArray<{ target: TargetType; synonyms: readonly string[] }> = [
  { target: 'file', synonyms: ['file', 'files', 'document', 'doc'] },
  { target: 'folder', synonyms: ['folder', 'folders', 'directory', 'directories', 'dir'] },
  { target: 'process', synonyms: ['process', 'processes', 'program', 'application', 'app'] },
  { target: 'service', synonyms: ['service', 'services', 'daemon'] },
  { target: 'user', synonyms: ['user', 'users', 'account'] },
];

// ============================================================================
// Parameter Families
// ============================================================================

const NAME = String.raw`[\w\-.\\/]+`;

/** Single-value parameters, matched case-insensitively against the original query. */
export const PARAMETER_FAMILIES: ReadonlyArray<RuleFamily<string, string>> = [
  {
    key: 'filename',
    rules: [
      captureRule(/file\s+["']([^"']+)["']/i),
      captureRule(/file\s+named?\s+["']([^"']+)["']/i),
      captureRule(/file\s+called\s+["']([^"']+)["']/i),
      captureRule(new RegExp(String.raw`file\s+named?\s+(${NAME})`, 'i')),
      captureRule(new RegExp(String.raw`file\s+called\s+(${NAME})`, 'i')),
      captureRule(/([\w-]+\.\w+)\s+file/i),
    ],
  },
  {
    key: 'foldername',
    rules: [
      captureRule(/folder\s+["']([^"']+)["']/i),
      captureRule(/directory\s+["']([^"']+)["']/i),
      captureRule(/folder\s+named?\s+["']([^"']+)["']/i),
      captureRule(/folder\s+called\s+["']([^"']+)["']/i),
      captureRule(/(?:folder|directory)\s+named?\s+([\w-]+)/i),
      captureRule(/(?:folder|directory)\s+called\s+([\w-]+)/i),
    ],
  },
  {
    key: 'process',
    rules: [
      captureRule(/process\s+["']([^"']+)["']/i),
      captureRule(/program\s+["']([^"']+)["']/i),
      captureRule(/application\s+["']([^"']+)["']/i),
      captureRule(/(?:kill|stop|close|terminate)\s+(?:process\s+)?["']?(\w+)["']?(?:\s+process)?/i),
      captureRule(/(?:start|run|launch|open)\s+(?:the\s+)?(?:process|program|application|app)\s+["']?([\w.-]+)/i),
    ],
  },
  {
    key: 'service',
    rules: [
      captureRule(/(?:service|daemon)\s+["']?([\w.@-]+)/i),
      captureRule(/\b(?!the\b|a\b|an\b)([\w.@-]+)\s+(?:service|daemon)\b/i),
    ],
  },
  {
    key: 'path',
    rules: [
      captureRule(/(?:in|to|at)\s+["']([A-Za-z]:[\\/].+?)["']/),
      captureRule(/(?:in|to|at)\s+["']([/~].+?)["']/),
      captureRule(/(?:in|to|at)\s+([A-Za-z]:[\\/]\S+)/),
      captureRule(/(?:in|to|at)\s+([/~]\S+)/),
    ],
  },
  {
    key: 'port',
    rules: [captureRule(/port\s+(\d+)/i), captureRule(/:(\d+)/)],
  },
  {
    key: 'ip',
    rules: [captureRule(/(\d+\.\d+\.\d+\.\d+)/)],
  },
  {
    key: 'extension',
    rules: [captureRule(/\.(\w+)\s+files?/i), captureRule(/files?\s+with\s+\.(\w+)/i)],
  },
  {
    key: 'pattern',
    rules: [captureRule(/(\*[\w.*-]*)/)],
  },
  {
    key: 'number',
    rules: [
      captureRule(/(\d+)\s+(?:files?|items?|processes?)/i),
      captureRule(/top\s+(\d+)/i),
      captureRule(/last\s+(\d+)/i),
      captureRule(/first\s+(\d+)/i),
    ],
  },
  {
    key: 'content',
    rules: [
      captureRule(/with\s+content\s+["'](.+?)["']/i),
      captureRule(/containing\s+["'](.+?)["']/i),
      captureRule(/text\s+["'](.+?)["']/i),
    ],
  },
  {
    key: 'url',
    rules: [captureRule(/((?:https?|git|ssh):\/\/\S+|git@\S+)/i)],
  },
  {
    key: 'branchname',
    rules: [captureRule(/branch\s+(?:named?|called)\s+["']?([\w./-]+)/i)],
  },
  {
    key: 'message',
    rules: [
      captureRule(/message\s+["'](.+?)["']/i),
      captureRule(/commit\b.*?["'](.+?)["']/i),
    ],
  },
];

/** Two-value parameters: "rename X to Y", "copy X to Y". First match wins. */
export const PAIR_RULES: ReadonlyArray<PatternRule<TemplateParameters>> = [
  {
    pattern: new RegExp(
      String.raw`\b(?:rename|move|mv)\s+(?:the\s+)?(?:file\s+|folder\s+)?["']?(${NAME})["']?\s+(?:to|as)\s+["']?(${NAME})`,
      'i',
    ),
    extract: (match) => ({ old_name: match[1], new_name: match[2] }),
  },
  {
    pattern: new RegExp(
      String.raw`\b(?:copy|cp|duplicate)\s+(?:the\s+)?(?:file\s+)?["']?(${NAME})["']?\s+(?:to|into)\s+["']?(${NAME})`,
      'i',
    ),
    extract: (match) => ({ source: match[1], destination: match[2] }),
  },
];

// ============================================================================
// Nested Operations
// ============================================================================

function nested(folder: string, file: string): NestedOperation {
  return { parent: { type: 'folder', name: folder }, child: { type: 'file', name: file } };
}

export const NESTED_RULES: ReadonlyArray<PatternRule<NestedOperation>> = [
  {
    pattern:
      /(?:folder|directory)\s+(?:named?\s+|called\s+)?["']?([\w\-.]+)["']?\s+(?:with|containing|and)\s+(?:a\s+)?file\s+(?:named?\s+|called\s+)?["']?([\w\-.]+)["']?/i,
    extract: (match) => nested(match[1], match[2]),
  },
  {
    pattern:
      /file\s+(?:named?\s+|called\s+)?["']?([\w\-.]+)["']?\s+(?:in|inside)\s+(?:folder|directory)\s+(?:named?\s+|called\s+)?["']?([\w\-.]+)["']?/i,
    extract: (match) => nested(match[2], match[1]),
  },
];

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract named parameters from the original query.
 *
 * A nested operation overrides `foldername` and `filename` with its
 * parent and child names; a find pattern is derived from an extension
 * or a file name when the query gives no explicit wildcard.
 */
export function extractParameters(query: string, nestedOperation: NestedOperation | null = null): TemplateParameters {
  const parameters: TemplateParameters = {};
  for (const [name, value] of Object.entries(matchFamilies(query, PARAMETER_FAMILIES))) {
    if (value !== undefined) parameters[name] = value;
  }
  Object.assign(parameters, firstMatch(query, PAIR_RULES));

  if (nestedOperation) {
    parameters.foldername = nestedOperation.parent.name;
    parameters.filename = nestedOperation.child.name;
  }

  if (!parameters.pattern) {
    if (parameters.extension) {
      parameters.pattern = `*.${parameters.extension}`;
    } else if (parameters.filename) {
      parameters.pattern = parameters.filename;
    }
  }

  return parameters;
}

export function extractNestedOperation(query: string): NestedOperation | null {
  return firstMatch(query, NESTED_RULES);
}

/**
 * Analyze a query for template generation.
 *
 * @example
 * ```ts
 * analyze('kill process chrome');
 * // => { intent: 'kill', action: 'kill', targets: ['process'],
 * //      parameters: { process: 'chrome' }, nested: null, ... }
 * ```
 */
export function analyze(query: string): QueryAnalysis {
  const lower = query.toLowerCase();
  const nestedOperation = extractNestedOperation(query);
  const parameters = extractParameters(query, nestedOperation);

  const gitIntent = firstMatch(lower, GIT_INTENT_RULES);
  if (gitIntent) {
    return { query, intent: gitIntent, action: 'git', targets: [], parameters, nested: nestedOperation };
  }

  let intent: string | null = null;
  let action: string | null = null;
  for (const entry of INTENT_VERBS) {
    const verb = entry.verbs.find((v) => containsWord(lower, v));
    if (verb) {
      intent = entry.intent;
      action = verb;
      break;
    }
  }

  const targets = TARGET_SYNONYMS
    .filter((entry) => entry.synonyms.some((synonym) => containsWord(lower, synonym)))
    .map((entry) => entry.target);

  return { query, intent, action, targets, parameters, nested: nestedOperation };
}
