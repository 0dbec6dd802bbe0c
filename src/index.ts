// ═══════════════════════════════════════════════════════════════════════════════
// token-extract — Library Entry Point
// ═══════════════════════════════════════════════════════════════════════════════
//
// import { extract, aggregate, formatHuman } from 'token-extract';
//
// const record = aggregate('notes.txt', extract('Mail ops@example.com at 9:30 AM'));
// console.log(formatHuman(record));
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './extraction/index.js';
export * from './export/index.js';
export * from './sources/index.js';
export * from './cli/index.js';

export {
  PatternCompileError,
  SourceUnavailableError,
  SinkWriteError,
  CliUsageError,
} from './types/errors.js';

export type { Result, Ok, Err, AsyncResult } from './types/result.js';
export { ok, err, isOk, isErr, unwrap, unwrapOr } from './types/result.js';

export {
  loadConfig,
  reloadConfig,
  resetConfig,
  parseConfig,
  ConfigError,
  type ExtractorConfig,
} from './config/index.js';

export { Logger, getLogger, configureLogger, resetLogger, redactPII, type LoggerOptions } from './logging/index.js';
