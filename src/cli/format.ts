/**
 * Human-readable rendering for --pretty output and the REPL.
 */

import pc from 'picocolors';
import type { ArbitrationDecision, ResolutionMethod, Suggestion } from '../resolver/types.js';
import type { CommandChain } from '../chain/types.js';
import type { RiskAssessment, RiskSeverity } from '../safety/types.js';
import type { SimilarityMatch, DiagnosisSolution } from '../matching/index.js';

const METHOD_LABELS: Record<ResolutionMethod, string> = {
  ml: 'ML',
  template: 'TEMPLATE',
  fuzzy: 'FUZZY',
  problem_diagnosis: 'DIAGNOSIS',
  rule: 'RULE',
};

const METHOD_COLORS: Record<ResolutionMethod, (text: string) => string> = {
  ml: (text) => pc.bgMagenta(pc.black(text)),
  template: (text) => pc.bgGreen(pc.black(text)),
  fuzzy: (text) => pc.bgYellow(pc.black(text)),
  problem_diagnosis: (text) => pc.bgCyan(pc.black(text)),
  rule: (text) => pc.bgBlue(pc.white(text)),
};

const SEVERITY_COLORS: Record<RiskSeverity, (text: string) => string> = {
  CRITICAL: (text) => pc.bold(pc.red(text)),
  HIGH: pc.red,
  MEDIUM: pc.yellow,
  LOW: pc.yellow,
};

export function methodBadge(method: ResolutionMethod): string {
  return METHOD_COLORS[method](` ${METHOD_LABELS[method]} `);
}

/** 0-1 confidence as a one-decimal percentage */
export function formatPercent(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}

export function formatDecision(decision: ArbitrationDecision): string[] {
  if (!decision.command || !decision.method) {
    return [pc.red(`✗ ${decision.error ?? 'No command resolved'}`)];
  }

  const lines = [
    `${methodBadge(decision.method)} ${pc.bold(decision.command)} ${pc.dim(`(${formatPercent(decision.confidence)})`)}`,
  ];
  if (decision.chosen?.explanation) {
    lines.push(pc.dim(`  ${decision.chosen.explanation}`));
  }
  if (decision.warning) {
    lines.push(pc.yellow(`  ⚠ ${decision.warning}`));
  }
  return lines;
}

export function formatChain(chain: CommandChain): string[] {
  const lines = [pc.bold(`Multi-command request (${chain.commandCount} steps)`)];
  for (const segment of chain.segments) {
    lines.push(`${pc.dim(`${segment.order}.`)} ${segment.resolvedText}`);
    lines.push(...formatDecision(segment.resolution).map((line) => `   ${line}`));
  }
  lines.push('');
  if (chain.chainedCommand) {
    lines.push(`${pc.green('✓')} ${pc.bold(chain.chainedCommand)} ${pc.dim(`(${formatPercent(chain.confidence)})`)}`);
  } else {
    lines.push(pc.red(`✗ Could not resolve step(s) ${chain.failedSegments.join(', ')}`));
  }
  return lines;
}

export function formatSuggestions(suggestions: Suggestion[]): string[] {
  if (suggestions.length === 0) return [];
  return [
    pc.dim('Did you mean:'),
    ...suggestions.map((s) => `  ${methodBadge(s.method)} ${s.command} ${pc.dim(`(${formatPercent(s.confidence)})`)}`),
  ];
}

export function formatSearch(matches: SimilarityMatch[], diagnoses: DiagnosisSolution[]): string[] {
  const lines: string[] = [];
  if (matches.length > 0) {
    lines.push(pc.bold('Similar queries'));
    for (const match of matches) {
      lines.push(`  ${match.score.toFixed(1).padStart(5)}  ${match.key} ${pc.dim('→')} ${match.info.command}`);
    }
  }
  if (diagnoses.length > 0) {
    lines.push(pc.bold('Known problems'));
    for (const solution of diagnoses) {
      lines.push(`  [${solution.category}] ${solution.problem} ${pc.dim('→')} ${solution.command}`);
      lines.push(pc.dim(`      ${solution.explanation}`));
    }
  }
  if (lines.length === 0) {
    lines.push(pc.dim('No similar queries or known problems'));
  }
  return lines;
}

export function formatRisk(command: string, assessment: RiskAssessment): string[] {
  if (!assessment.isRisky || !assessment.severity) {
    return [pc.green(`✓ ${command}: no risky patterns found`)];
  }

  const color = SEVERITY_COLORS[assessment.severity];
  const lines = [color(`⚠ RISK LEVEL: ${assessment.severity}`), pc.dim(`Command: ${command}`), ''];
  assessment.matches.forEach((match, i) => {
    lines.push(SEVERITY_COLORS[match.severity](`Risk #${i + 1}: '${match.keyword}' (${match.severity})`));
    lines.push(`  Explanation: ${match.explanation}`);
    lines.push(`  Alternative: ${match.alternative}`);
  });
  return lines;
}
