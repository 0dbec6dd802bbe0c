// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context and PII Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// Log lines go to stderr so that stdout carries only the extraction report.
// Extracted values are emails, phone numbers and card numbers, so redaction is
// on unless REDACT_PII=false.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  ConfigError,
  loadConfig,
  type ExtractorConfig,
  type LogFormat,
  type LogLevel,
} from '../config/index.js';

export type { LogLevel } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  component?: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  redactPII?: boolean;
  /** Receives each rendered line; defaults to console.error */
  write?: (line: string) => void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PII REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const PII_PATTERNS = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Credit card, before phone so 16 digits are not read as a phone number
  { pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, replacement: '[CARD]' },
  // Phone (various formats)
  { pattern: /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g, replacement: '[PHONE]' },
];

export function redactPII(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function redactObject(obj: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof obj === 'string') {
    return redactPII(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(item => redactObject(item, depth + 1));
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = redactObject(value, depth + 1);
    }
    return result;
  }

  return obj;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private redactPII: boolean;
  private jsonFormat: boolean;
  private write: (line: string) => void;
  private options: LoggerOptions;

  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;

    const needsConfig =
      options.level === undefined || options.format === undefined || options.redactPII === undefined;
    const logging = needsConfig ? configuredLogging() : undefined;

    this.minLevel = options.level ?? logging?.level ?? 'warn';
    this.redactPII = options.redactPII ?? logging?.redactPII ?? true;
    this.jsonFormat = (options.format ?? logging?.format) === 'json';
    this.write = options.write ?? ((line: string) => console.error(line));
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactPII ? redactPII(message) : message,
      ...this.context,
      ...extra,
    };

    if (this.redactPII && entry.metadata) {
      const redacted = redactObject(entry.metadata);
      entry.metadata = isRecord(redacted) ? redacted : undefined;
    }

    if (this.redactPII && entry.error) {
      entry.error = {
        name: entry.error.name,
        message: redactPII(entry.error.message),
      };
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      this.write(JSON.stringify(entry));
      return;
    }

    const component = entry.component ? `[${entry.component}]` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
      fatal: '\x1b[35m', // magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    this.write(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${component} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      this.write(`   ${JSON.stringify(entry.metadata)}`);
    }

    if (entry.error) {
      this.write(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        this.write(`   ${entry.error.stack.split('\n').slice(1, 4).join('\n  ')}`);
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, { metadata, error: describeError(error) });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { metadata, error: describeError(error) });
  }

  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    const duration = Date.now() - startTime;
    this.log('info', message, { duration, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context }, this.options);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.minLevel);
  }
}

function describeError(error?: Error): LogEntry['error'] {
  if (!error) return undefined;
  return { name: error.name, message: error.message, stack: error.stack };
}

/**
 * Logging settings from the environment, or undefined when the environment
 * does not validate; the logger then runs on its defaults.
 */
function configuredLogging(): ExtractorConfig['logging'] | undefined {
  try {
    return loadConfig().logging;
  } catch (error) {
    if (error instanceof ConfigError) return undefined;
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. with settings from an injected config.
 */
export function configureLogger(options: LoggerOptions): Logger {
  rootLogger = new Logger({}, options);
  return rootLogger;
}

export function resetLogger(): void {
  rootLogger = null;
}

// Component-specific loggers
export const loggers = {
  registry: () => getLogger({ component: 'registry' }),
  source: () => getLogger({ component: 'source' }),
  sink: () => getLogger({ component: 'sink' }),
  cli: () => getLogger({ component: 'cli' }),
};
