/**
 * Risk assessment for generated shell commands.
 *
 * Scans a command against a fixed table of destructive constructs and
 * reports every match together with the highest severity found. Patterns
 * anchor on word and argument boundaries so that `rm -rf /` stays distinct
 * from `rm -rf /tmp` and `del` does not fire inside `model`.
 */

import { RISK_SEVERITIES } from './types.js';
import type { RiskAssessment, RiskMatch, RiskPattern, RiskSeverity } from './types.js';

/** Start of a command: beginning of text or after a shell separator. */
const COMMAND_START = String.raw`(?:^|[;&|]\s*)(?:sudo\s+)?`;

// ============================================================================
// Pattern Table
// ============================================================================

export const RISK_PATTERNS: readonly RiskPattern[] = [
  {
    keyword: 'del /s',
    pattern: /\bdel\s+(?:\/\w\s+)*\/s\b/i,
    severity: 'CRITICAL',
    explanation: 'Recursively deletes files - can destroy entire directories',
    alternative: "Use 'del <specific_file>' to delete one file at a time",
  },
  {
    keyword: 'rm -rf /',
    pattern: /\brm\s+-(?:rf|fr)\s+\/(?:\*)?(?=\s|$)/i,
    severity: 'CRITICAL',
    explanation: 'DESTROYS ENTIRE SYSTEM - Deletes all files on system',
    alternative: 'Never run this command! Specify exact directory instead',
  },
  {
    keyword: 'rm -rf',
    pattern: /\brm\s+-(?:rf|fr)\b/i,
    severity: 'CRITICAL',
    explanation: 'Forcefully deletes directory tree - no confirmation',
    alternative: "Use 'rm -r' for confirmation prompts or specify exact path",
  },
  {
    keyword: 'format',
    pattern: new RegExp(`${COMMAND_START}format\\b`, 'i'),
    severity: 'CRITICAL',
    explanation: 'Formats/erases entire disk partition',
    alternative: 'Double-check drive letter before formatting',
  },
  {
    keyword: 'mkfs',
    pattern: /\bmkfs(?:\.\w+)?\b/i,
    severity: 'CRITICAL',
    explanation: 'Creates new filesystem - erases all data on partition',
    alternative: 'Ensure correct device is specified (e.g., /dev/sdb1 not /dev/sda1)',
  },
  {
    keyword: 'dd',
    pattern: new RegExp(`${COMMAND_START}dd\\s+(?:if|of)=`, 'i'),
    severity: 'CRITICAL',
    explanation: 'Low-level disk copy - can overwrite wrong drive',
    alternative: "Triple-check 'if' and 'of' parameters before running",
  },
  {
    keyword: 'shutdown',
    pattern: /\bshutdown\b/i,
    severity: 'HIGH',
    explanation: 'Shuts down the system',
    alternative: 'Save all work before executing',
  },
  {
    keyword: 'reboot',
    pattern: /\breboot\b/i,
    severity: 'HIGH',
    explanation: 'Restarts the system immediately',
    alternative: "Use 'shutdown -r +5' to delay 5 minutes",
  },
  {
    keyword: 'systemctl stop',
    pattern: /\bsystemctl\s+stop\b/i,
    severity: 'HIGH',
    explanation: 'Stops system service - may affect system functionality',
    alternative: "Use 'systemctl restart' to restart instead of stopping",
  },
  {
    keyword: 'net user',
    pattern: /\bnet\s+user\b/i,
    severity: 'HIGH',
    explanation: 'Modifies user accounts - can lock you out',
    alternative: 'Be careful when changing passwords or disabling accounts',
  },
  {
    keyword: 'chmod 777',
    pattern: /\bchmod\s+(?:-R\s+)?777\b/i,
    severity: 'HIGH',
    explanation: 'Gives full permissions to everyone - security risk',
    alternative: 'Use minimal permissions needed (e.g., chmod 755)',
  },
  {
    keyword: 'del',
    pattern: new RegExp(`${COMMAND_START}del\\s`, 'i'),
    severity: 'MEDIUM',
    explanation: 'Deletes files - cannot be undone easily',
    alternative: 'Move to recycle bin first or backup important files',
  },
  {
    keyword: 'rm',
    pattern: new RegExp(`${COMMAND_START}rm\\s`, 'i'),
    severity: 'MEDIUM',
    explanation: 'Removes files permanently',
    alternative: "Use 'mv file ~/.Trash' to move to trash instead",
  },
  {
    keyword: 'kill -9',
    pattern: /\bkill\s+-9\b/i,
    severity: 'MEDIUM',
    explanation: 'Force kills process without cleanup',
    alternative: "Try 'kill <pid>' first (allows graceful shutdown)",
  },
  {
    keyword: 'pkill',
    pattern: /\bpkill\b/i,
    severity: 'MEDIUM',
    explanation: 'Kills processes by name - may affect multiple processes',
    alternative: "Check processes with 'ps aux | grep <name>' first",
  },
  {
    keyword: 'chown -R',
    pattern: /\bchown\s+-R\b/i,
    severity: 'MEDIUM',
    explanation: 'Recursively changes file ownership',
    alternative: 'Specify exact directory to avoid unintended changes',
  },
  {
    keyword: 'firewall',
    pattern: /firewall/i,
    severity: 'LOW',
    explanation: 'Modifies firewall settings',
    alternative: 'Backup firewall rules before making changes',
  },
  {
    keyword: 'ufw',
    pattern: /\bufw\b/i,
    severity: 'LOW',
    explanation: 'Changes firewall configuration',
    alternative: 'Test rules before applying permanently',
  },
  {
    keyword: 'diskpart',
    pattern: /\bdiskpart\b/i,
    severity: 'LOW',
    explanation: 'Disk partition management tool',
    alternative: 'Use carefully - can affect disk structure',
  },
];

// ============================================================================
// Assessment
// ============================================================================

function severityRank(severity: RiskSeverity): number {
  return RISK_SEVERITIES.indexOf(severity);
}

/** Pick the more severe of two levels. */
export function maxSeverity(a: RiskSeverity | null, b: RiskSeverity): RiskSeverity {
  if (a === null) return b;
  return severityRank(b) < severityRank(a) ? b : a;
}

/**
 * Scan a command for risky constructs.
 *
 * Matches are reported in table order; severity is the highest matched.
 */
export function assessRisk(
  command: string,
  patterns: readonly RiskPattern[] = RISK_PATTERNS,
): RiskAssessment {
  const matches: RiskMatch[] = [];
  let severity: RiskSeverity | null = null;

  for (const { keyword, pattern, severity: level, explanation, alternative } of patterns) {
    if (!pattern.test(command)) continue;
    matches.push({ keyword, severity: level, explanation, alternative });
    severity = maxSeverity(severity, level);
  }

  return { isRisky: matches.length > 0, severity, matches, riskCount: matches.length };
}

export function isRiskyCommand(command: string): boolean {
  return assessRisk(command).isRisky;
}

// ============================================================================
// Report
// ============================================================================

export const SAFE_REPORT = 'This command appears safe to execute';

const RULE = '='.repeat(70);

/**
 * Plain-text safety report listing every match with its explanation and
 * a safer alternative.
 */
export function safetyReport(command: string): string {
  const assessment = assessRisk(command);
  if (!assessment.isRisky || assessment.severity === null) {
    return SAFE_REPORT;
  }

  const lines = [
    RULE,
    `SAFETY REPORT: ${command}`,
    RULE,
    `Risk Level: ${assessment.severity}`,
    `Risky Patterns Found: ${assessment.riskCount}`,
    '',
  ];

  assessment.matches.forEach((match, i) => {
    lines.push(`${i + 1}. ${match.keyword} (${match.severity})`);
    lines.push(`   ${match.explanation}`);
    lines.push(`   Alternative: ${match.alternative}`);
    lines.push('');
  });

  return lines.join('\n');
}
