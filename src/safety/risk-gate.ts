/**
 * Confirmation gate for risky commands.
 *
 * Pure function that decides whether a generated command may run
 * straight away or needs typed confirmation first. The number and
 * strictness of the confirmation steps scale with severity:
 *
 * 1. CRITICAL: retype the full command, then the acknowledgement phrase.
 *    Both are compared exactly.
 * 2. HIGH: type `yes`.
 * 3. MEDIUM / LOW: answer `yes` to a proceed prompt.
 *
 * This is a decision function only. The CLI layer asks the questions
 * and checks answers with {@link confirmationAccepted}.
 */

import { assessRisk } from './risk-assessor.js';
import type { ConfirmationStep, RiskGateDecision, RiskSeverity } from './types.js';

export const ACKNOWLEDGEMENT_PHRASE = 'I UNDERSTAND THE RISK';

function confirmationSteps(command: string, severity: RiskSeverity): ConfirmationStep[] {
  switch (severity) {
    case 'CRITICAL':
      return [
        {
          prompt: 'CRITICAL: this command can destroy data or the system. Type the full command to confirm',
          expected: command,
          caseSensitive: true,
        },
        {
          prompt: `Final confirmation. Type '${ACKNOWLEDGEMENT_PHRASE}'`,
          expected: ACKNOWLEDGEMENT_PHRASE,
          caseSensitive: true,
        },
      ];
    case 'HIGH':
      return [
        {
          prompt: "HIGH RISK: this command makes system-wide changes. Type 'yes' to proceed",
          expected: 'yes',
          caseSensitive: false,
        },
      ];
    case 'MEDIUM':
    case 'LOW':
      return [{ prompt: 'Proceed? (yes/no)', expected: 'yes', caseSensitive: false }];
  }
}

/**
 * Evaluate the gate for a command.
 *
 * @param command - The command about to run
 * @param action - What is about to happen to it, used in the reason
 */
export function evaluateRiskGate(command: string, action = 'execute'): RiskGateDecision {
  const assessment = assessRisk(command);

  if (!assessment.isRisky || assessment.severity === null) {
    return {
      action: 'proceed',
      reason: `No risky patterns found; safe to ${action}`,
      severity: null,
      assessment,
      confirmations: [],
    };
  }

  const keywords = assessment.matches.map((m) => `'${m.keyword}'`).join(', ');
  return {
    action: 'confirm',
    reason: `${assessment.severity} risk (${keywords}): confirmation required to ${action}`,
    severity: assessment.severity,
    assessment,
    confirmations: confirmationSteps(command, assessment.severity),
  };
}

/** Check a typed answer against one confirmation step. Surrounding whitespace is ignored. */
export function confirmationAccepted(step: ConfirmationStep, answer: string): boolean {
  const given = answer.trim();
  return step.caseSensitive ? given === step.expected : given.toLowerCase() === step.expected.toLowerCase();
}
