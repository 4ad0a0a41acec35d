/**
 * `nlcmd risk` - assess a shell command against the risk patterns.
 */

import { evaluateRiskGate } from '../../safety/index.js';
import { extractPositionalArgs, hasFlag } from '../args.js';
import { formatRisk } from '../format.js';

/**
 * CLI entry for `risk`. Prints the assessment and the gate decision.
 *
 * @returns Exit code: 0 once assessed, 1 without a command
 */
export async function riskCommand(args: string[]): Promise<number> {
  const command = extractPositionalArgs(args);

  if (!command) {
    console.log(JSON.stringify({
      error: 'No command provided',
      help: 'Usage: nlcmd risk "rm -rf build"',
    }, null, 2));
    return 1;
  }

  const decision = evaluateRiskGate(command, 'execute');

  if (hasFlag(args, 'pretty')) {
    console.log(formatRisk(command, decision.assessment).join('\n'));
  } else {
    const { assessment, ...gate } = decision;
    console.log(JSON.stringify({ command, ...assessment, gate }, null, 2));
  }

  return 0;
}
