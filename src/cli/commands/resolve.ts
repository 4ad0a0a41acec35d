/**
 * `nlcmd resolve` - translate a request into a shell command.
 *
 * Glue only: the context does the resolving, this layer parses flags,
 * records the audit log and prints JSON (default) or --pretty text.
 * Single-command requests print the arbitration decision; compound
 * requests print the whole chain.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { ResolverContext } from '../../context.js';
import { extractPositionalArgs, hasFlag, parseMethodFlag } from '../args.js';
import { formatChain, formatDecision, formatSuggestions } from '../format.js';
import { executeCommand } from '../execute.js';
import type { ConfirmationPrompter } from '../execute.js';
import { loadContextFromArgs } from '../load-context.js';

function showResolveHelp(): void {
  console.log(`
nlcmd resolve - Translate a natural-language request into a shell command

Usage:
  nlcmd resolve "<request>" [options]

Options:
  --os=windows|linux     Target OS family (default: config or host)
  --method=ml|fuzzy|rule Restrict the cascade to one method family
  --pretty               Human-readable output (default: JSON)
  --execute              Run the command after the risk gate and confirmation
  --config=<path>        Config file (default: nlcmd.config.json)
  --help, -h             Show this help message

Exit codes:
  0  a command was resolved
  1  no command could be resolved, or invalid input
`);
}

export interface ResolveCommandDeps {
  context?: ResolverContext;
  prompter?: ConfirmationPrompter;
  run?: (command: string) => Promise<number>;
}

/**
 * CLI entry for `resolve`.
 *
 * @returns Exit code: 0 when resolved, 1 otherwise
 */
export async function resolveCommand(args: string[], deps: ResolveCommandDeps = {}): Promise<number> {
  if (hasFlag(args, 'help') || args.includes('-h')) {
    showResolveHelp();
    return 0;
  }

  const pretty = hasFlag(args, 'pretty');
  const query = extractPositionalArgs(args);

  if (!query) {
    console.log(JSON.stringify({
      error: 'No request provided',
      help: 'Usage: nlcmd resolve "create a folder named proj"',
    }, null, 2));
    return 1;
  }

  const method = parseMethodFlag(args);
  if (!method.ok) {
    console.log(JSON.stringify({ error: method.error }, null, 2));
    return 1;
  }

  try {
    const ctx = deps.context ?? (await loadContextFromArgs(args));
    const options = method.value ? { restrictTo: method.value } : {};
    const chain = ctx.multiCommand.process(query, options);

    if (ctx.logger) {
      for (const segment of chain.segments) {
        await ctx.logger.log(segment.resolution, ctx.osFamily);
      }
    }

    const single = chain.isMultiCommand ? null : chain.segments[0]?.resolution ?? null;

    if (pretty) {
      const lines = single ? formatDecision(single) : formatChain(chain);
      if (single && !single.command && single.status !== 'invalid') {
        lines.push(...formatSuggestions(ctx.arbitrator.suggest(query)));
      }
      console.log(lines.join('\n'));
    } else {
      console.log(JSON.stringify(single ?? chain, null, 2));
    }

    const command = chain.chainedCommand;
    if (!command) {
      return 1;
    }

    if (hasFlag(args, 'execute')) {
      const exitCode = await executeCommand(command, deps.prompter, deps.run);
      if (exitCode === null) {
        p.log.info('Execution skipped');
      } else if (exitCode !== 0) {
        p.log.error(`Command exited with code ${exitCode}`);
        return 1;
      } else {
        p.log.success(pc.green('Command completed'));
      }
    }

    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ error: message }, null, 2));
    return 1;
  }
}
