/**
 * Multi-command orchestrator: detects, splits, context-resolves and
 * chains a compound request through the resolution arbitrator.
 */

import type { ResolutionArbitrator } from '../resolver/resolution-arbitrator.js';
import type { ResolveOptions } from '../resolver/types.js';
import { resolveContext } from './context-resolver.js';
import { detectMultiCommand, splitCommands } from './multi-command-detector.js';
import type { CommandChain, CommandSegment } from './types.js';

/** Shell separator joining segment commands */
export const CHAIN_SEPARATOR = ' && ';

/**
 * @example
 * ```ts
 * const orchestrator = new MultiCommandOrchestrator(arbitrator);
 * orchestrator.process('create a folder named proj and then create a file named notes.txt inside the folder');
 * // => { isMultiCommand: true, chainedCommand: 'mkdir proj && echo. > proj\\notes.txt', ... } (windows)
 * ```
 */
export class MultiCommandOrchestrator {
  constructor(private readonly arbitrator: ResolutionArbitrator) {}

  process(query: string, options: ResolveOptions = {}): CommandChain {
    const detection = detectMultiCommand(query);
    const texts = detection.isMultiCommand ? splitCommands(query) : [query];

    const segments: CommandSegment[] = [];
    const previousCommands: string[] = [];

    texts.forEach((sourceText, index) => {
      const resolvedText = index === 0
        ? sourceText
        : resolveContext(sourceText, previousCommands, this.arbitrator.osFamily);
      const resolution = this.arbitrator.resolve(resolvedText, options);
      if (resolution.command) {
        previousCommands.push(resolution.command);
      }
      segments.push({ order: index + 1, sourceText, resolvedText, resolution });
    });

    const failedSegments = segments.filter((s) => !s.resolution.command).map((s) => s.order);
    const success = failedSegments.length === 0;

    const chain: CommandChain = {
      query,
      isMultiCommand: segments.length > 1,
      commandCount: segments.length,
      detection,
      segments,
      success,
      confidence: success ? Math.min(...segments.map((s) => s.resolution.confidence)) : 0,
      failedSegments,
    };

    if (success) {
      chain.chainedCommand = segments.map((s) => s.resolution.command ?? '').join(CHAIN_SEPARATOR);
    }
    return chain;
  }
}
