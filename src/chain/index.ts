/**
 * Multi-command requests: detection, splitting, context resolution and
 * chaining.
 */

export type { MultiCommandDetection, CommandSegment, CommandChain } from './types.js';
export {
  ACTION_VERBS,
  CONJUNCTION_MARKERS,
  SEGMENT_SEPARATORS,
  detectMultiCommand,
  splitCommands,
} from './multi-command-detector.js';
export { REFERENCE_PHRASES, lastCreatedFolder, resolveContext } from './context-resolver.js';
export { MultiCommandOrchestrator, CHAIN_SEPARATOR } from './multi-command-orchestrator.js';
