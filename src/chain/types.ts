/**
 * Type definitions for multi-command requests.
 */

import type { ArbitrationDecision } from '../resolver/types.js';

export interface MultiCommandDetection {
  isMultiCommand: boolean;
  /** Action-verb occurrences across whitespace tokens */
  actionCount: number;
  /** The action verbs found, in query order (repeats kept) */
  actions: string[];
  /** Conjunction markers present, in marker-table order */
  markers: string[];
}

export interface CommandSegment {
  /** 1-based position in the request */
  order: number;
  /** Segment text as split from the query */
  sourceText: string;
  /** Text actually resolved, after context resolution */
  resolvedText: string;
  resolution: ArbitrationDecision;
}

export interface CommandChain {
  query: string;
  /** True when the request split into more than one segment */
  isMultiCommand: boolean;
  commandCount: number;
  detection: MultiCommandDetection;
  segments: CommandSegment[];
  /** Every segment produced a command (accepted or fallback) */
  success: boolean;
  /** Segment commands joined with ` && `; only set when `success` */
  chainedCommand?: string;
  /** Weakest segment confidence when `success`, else 0 */
  confidence: number;
  /** Orders of the segments that produced no command */
  failedSegments: number[];
}
