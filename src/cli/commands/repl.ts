/**
 * `nlcmd repl` - interactive resolve loop.
 *
 * Each line is resolved (compound requests included) and printed in the
 * pretty format. `exit`, `quit` or Ctrl+C leaves.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { ResolverContext } from '../../context.js';
import { formatChain, formatDecision, formatSuggestions } from '../format.js';
import { loadContextFromArgs } from '../load-context.js';
import { textAnswer } from '../execute.js';

const EXIT_WORDS = new Set(['exit', 'quit']);

/**
 * Resolve one REPL line into printable text.
 */
export async function replLine(ctx: ResolverContext, line: string): Promise<string> {
  const chain = ctx.multiCommand.process(line);

  if (ctx.logger) {
    for (const segment of chain.segments) {
      await ctx.logger.log(segment.resolution, ctx.osFamily);
    }
  }

  if (chain.isMultiCommand) {
    return formatChain(chain).join('\n');
  }

  const lines: string[] = [];
  const decision = chain.segments[0]?.resolution;
  if (decision) {
    lines.push(...formatDecision(decision));
    if (!decision.command && decision.status !== 'invalid') {
      lines.push(...formatSuggestions(ctx.arbitrator.suggest(line)));
    }
  }
  return lines.join('\n');
}

/** Prompt for the next request; null when the user cancels */
async function readRequest(): Promise<string | null> {
  return textAnswer(await p.text({ message: 'What do you want to do?', placeholder: 'list all files', defaultValue: '' }));
}

/**
 * CLI entry for `repl`.
 */
export async function replCommand(
  args: string[],
  read: () => Promise<string | null> = readRequest,
): Promise<number> {
  let ctx: ResolverContext;
  try {
    ctx = await loadContextFromArgs(args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    p.log.error(message);
    return 1;
  }

  p.intro(pc.bgCyan(pc.black(' nlcmd ')));
  p.log.message(pc.dim(`OS family: ${ctx.osFamily}. Type a request, or "exit" to leave.`));

  for (;;) {
    const line = await read();

    if (line === null || EXIT_WORDS.has(line.trim().toLowerCase())) {
      break;
    }
    if (!line.trim()) {
      continue;
    }

    p.log.message(await replLine(ctx, line));
  }

  p.outro('Goodbye');
  return 0;
}
