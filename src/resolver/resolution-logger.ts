// ============================================================================
// Resolution Logger
// ============================================================================
// Append-only JSONL audit trail of resolution decisions. Write failures
// are reported on stderr and never reach the caller.

import { appendFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { OsFamilySchema } from '../types/os-family.js';
import type { OsFamily } from '../types/os-family.js';
import { ResolutionMethodSchema, ResolutionStatusSchema } from './types.js';
import type { ArbitrationDecision } from './types.js';

export const RESOLUTION_LOG_FILE = 'resolution-log.jsonl';

export const ResolutionLogEntrySchema = z.object({
  /** ISO 8601 timestamp */
  timestamp: z.string(),
  query: z.string(),
  osFamily: OsFamilySchema,
  status: ResolutionStatusSchema,
  method: ResolutionMethodSchema.nullable(),
  command: z.string().nullable(),
  confidence: z.number(),
  fallback: z.boolean(),
  /** Candidates that ran, chosen one included */
  candidateCount: z.number().int().nonnegative(),
});

export type ResolutionLogEntry = z.infer<typeof ResolutionLogEntrySchema>;

/**
 * Build the log entry for a decision.
 */
export function toLogEntry(decision: ArbitrationDecision, osFamily: OsFamily, now: Date = new Date()): ResolutionLogEntry {
  return {
    timestamp: now.toISOString(),
    query: decision.query,
    osFamily,
    status: decision.status,
    method: decision.method,
    command: decision.command,
    confidence: decision.confidence,
    fallback: decision.fallbackUsed,
    candidateCount: decision.rejected.length + (decision.chosen ? 1 : 0),
  };
}

/**
 * @example
 * ```ts
 * const logger = new ResolutionLogger('.nlcmd');
 * await logger.log(decision, 'linux');
 * const entries = await logger.readAll();
 * ```
 */
export class ResolutionLogger {
  private readonly logDir: string;
  private readonly logFile: string;

  constructor(logDir: string) {
    this.logDir = logDir;
    this.logFile = join(logDir, RESOLUTION_LOG_FILE);
  }

  get path(): string {
    return this.logFile;
  }

  /**
   * Append one decision to the audit log.
   */
  async log(decision: ArbitrationDecision, osFamily: OsFamily): Promise<void> {
    try {
      await mkdir(this.logDir, { recursive: true });
      await appendFile(this.logFile, JSON.stringify(toLogEntry(decision, osFamily)) + '\n', 'utf-8');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[resolution-logger] Failed to log: ${message}\n`);
    }
  }

  /**
   * Every valid entry in the log, skipping malformed lines.
   * Empty when the log does not exist yet.
   */
  async readAll(): Promise<ResolutionLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const entries: ResolutionLogEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        continue;
      }
      const result = ResolutionLogEntrySchema.safeParse(raw);
      if (result.success) {
        entries.push(result.data);
      }
    }
    return entries;
  }
}
