// ═══════════════════════════════════════════════════════════════════════════════
// REPORT FORMATTERS — Render a Result Record as Text, JSON, Markdown or CSV
// ═══════════════════════════════════════════════════════════════════════════════

import type { ResultRecord } from '../extraction/types.js';
import {
  DEFAULT_REPORT_OPTIONS,
  type ReportFormat,
  type ReportOptions,
  type SerializedResult,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SERIALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

export function serialize(record: ResultRecord): SerializedResult {
  const perCategory: Record<string, string[]> = {};
  for (const [category, values] of Object.entries(record.perCategory)) {
    perCategory[category] = [...values];
  }

  return {
    source: record.source,
    per_category: perCategory,
    counts: { ...record.counts },
    total_matches: record.totalMatches,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// BASE FORMATTER INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ReportFormatter {
  format(record: ResultRecord, options?: ReportOptions): string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TEXT FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class TextFormatter implements ReportFormatter {
  format(record: ResultRecord): string {
    const lines: string[] = [];

    const header = `Extraction results for ${record.source}`;
    lines.push(header);
    lines.push('='.repeat(header.length));

    // Record keys are in registry order
    for (const [category, values] of Object.entries(record.perCategory)) {
      lines.push(`${category}: ${values.length} found`);
      for (const value of values) {
        lines.push(`  - ${value}`);
      }
    }

    lines.push('');
    lines.push(`Total matches: ${record.totalMatches}`);

    return lines.join('\n');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// JSON FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class JsonFormatter implements ReportFormatter {
  format(record: ResultRecord, options: ReportOptions = DEFAULT_REPORT_OPTIONS): string {
    const document = serialize(record);
    return options.prettyPrint
      ? JSON.stringify(document, null, 2)
      : JSON.stringify(document);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MARKDOWN FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class MarkdownFormatter implements ReportFormatter {
  format(record: ResultRecord): string {
    const lines: string[] = [];

    lines.push(`# Extraction results: ${record.source}`);
    lines.push('');
    lines.push(`**Total matches:** ${record.totalMatches}`);

    for (const [category, values] of Object.entries(record.perCategory)) {
      lines.push('');
      lines.push(`## ${category} (${values.length})`);
      lines.push('');
      if (values.length === 0) {
        lines.push('_None found_');
        continue;
      }
      for (const value of values) {
        lines.push(`- \`${value}\``);
      }
    }

    return lines.join('\n');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CSV FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class CsvFormatter implements ReportFormatter {
  format(record: ResultRecord): string {
    const rows: string[] = ['category,value'];

    for (const [category, values] of Object.entries(record.perCategory)) {
      for (const value of values) {
        rows.push([category, this.escapeCsv(value)].join(','));
      }
    }

    return rows.join('\n');
  }

  private escapeCsv(value: string): string {
    if (value.includes(',') || value.includes('"') || value.includes('\n')) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function getFormatter(format: ReportFormat): ReportFormatter {
  switch (format) {
    case 'text':
      return new TextFormatter();
    case 'json':
      return new JsonFormatter();
    case 'markdown':
      return new MarkdownFormatter();
    case 'csv':
      return new CsvFormatter();
  }
}

/**
 * Human-readable report, as printed by the CLI.
 */
export function formatHuman(record: ResultRecord): string {
  return new TextFormatter().format(record);
}
