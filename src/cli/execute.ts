/**
 * Gated execution of a resolved command.
 *
 * The risk gate decides which typed confirmations are needed; every
 * command, risky or not, also needs an explicit final yes. Cancelling at
 * any step skips execution and nothing else.
 */

import { spawn } from 'node:child_process';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { confirmationAccepted, evaluateRiskGate } from '../safety/index.js';
import { formatRisk } from './format.js';

// ============================================================================
// Prompting
// ============================================================================

/** Interactive questions the gate needs answered */
export interface ConfirmationPrompter {
  /** Free-text answer, null when the user cancels */
  ask(message: string): Promise<string | null>;
  confirm(message: string): Promise<boolean>;
}

/**
 * Normalize a `p.text` result: null when cancelled, '' for an empty submit
 * (clack resolves that to undefined when no default applies).
 */
export function textAnswer(value: string | symbol | undefined): string | null {
  if (p.isCancel(value)) return null;
  return typeof value === 'string' ? value : '';
}

export const clackPrompter: ConfirmationPrompter = {
  async ask(message) {
    return textAnswer(await p.text({ message, defaultValue: '' }));
  },
  async confirm(message) {
    const answer = await p.confirm({ message, initialValue: false });
    return !p.isCancel(answer) && answer;
  },
};

// ============================================================================
// Gate
// ============================================================================

/**
 * Walk the risk gate and the final confirmation.
 *
 * @returns true when the user accepted every step
 */
export async function confirmExecution(
  command: string,
  prompter: ConfirmationPrompter = clackPrompter,
): Promise<boolean> {
  const decision = evaluateRiskGate(command, 'execute');

  if (decision.action === 'confirm') {
    p.log.warn(formatRisk(command, decision.assessment).join('\n'));
    for (const step of decision.confirmations) {
      const answer = await prompter.ask(step.prompt);
      if (answer === null || !confirmationAccepted(step, answer)) {
        p.log.info('Command cancelled for safety');
        return false;
      }
    }
  }

  return prompter.confirm(`Run ${pc.bold(command)}?`);
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Run a command through the system shell with inherited stdio.
 *
 * @returns The process exit code
 */
export function runShellCommand(command: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });
}

/**
 * Confirm, then run.
 *
 * @returns The command's exit code, or null when execution was declined
 */
export async function executeCommand(
  command: string,
  prompter: ConfirmationPrompter = clackPrompter,
  run: (command: string) => Promise<number> = runShellCommand,
): Promise<number | null> {
  if (!(await confirmExecution(command, prompter))) {
    return null;
  }
  return run(command);
}
