// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT TYPES — Report Formats and the Persisted Result Document
// ═══════════════════════════════════════════════════════════════════════════════

import type { ResultRecord } from '../extraction/types.js';
import type { AsyncResult } from '../types/result.js';
import type { SinkWriteError } from '../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATS
// ─────────────────────────────────────────────────────────────────────────────────

export const REPORT_FORMATS = ['text', 'json', 'markdown', 'csv'] as const;

export type ReportFormat = typeof REPORT_FORMATS[number];

export interface ReportOptions {
  prettyPrint: boolean;
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  prettyPrint: true,
};

// ─────────────────────────────────────────────────────────────────────────────────
// SERIALIZED DOCUMENT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Logical structure of results_<name>.json. Key order and whitespace are not
 * part of the contract.
 */
export interface SerializedResult {
  source: string;
  per_category: Record<string, string[]>;
  counts: Record<string, number>;
  total_matches: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINK
// ─────────────────────────────────────────────────────────────────────────────────

export interface ResultSink {
  /** Persist the record and resolve to where it went */
  write(record: ResultRecord): AsyncResult<string, SinkWriteError>;
}

export interface FileSinkConfig {
  directory: string;
  prettyPrint: boolean;
}
