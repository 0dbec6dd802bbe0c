// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT MODULE — Report Rendering and Result Persistence
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  ReportFormat,
  ReportOptions,
  SerializedResult,
  ResultSink,
  FileSinkConfig,
} from './types.js';

// Constants
export {
  REPORT_FORMATS,
  DEFAULT_REPORT_OPTIONS,
} from './types.js';

// Formatters
export {
  TextFormatter,
  JsonFormatter,
  MarkdownFormatter,
  CsvFormatter,
  getFormatter,
  formatHuman,
  serialize,
  type ReportFormatter,
} from './formatters.js';

// Sink
export {
  JsonFileSink,
  resultsFileName,
} from './sink.js';
