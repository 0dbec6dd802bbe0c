// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING TESTS — Levels, Formats, PII Redaction
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, afterEach, vi } from 'vitest';
import { resetConfig } from '../config/index.js';
import {
  configureLogger,
  Logger,
  loggers,
  redactPII,
  resetLogger,
  type LoggerOptions,
} from '../logging/index.js';

function createLogger(options: Partial<LoggerOptions> = {}): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(
    {},
    {
      level: 'info',
      format: 'json',
      redactPII: true,
      write: line => lines.push(line),
      ...options,
    }
  );
  return { logger, lines };
}

function parseLine(line: string | undefined): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line ?? 'null');
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('expected a JSON object log line');
  }
  return { ...parsed };
}

describe('redactPII', () => {
  it('should mask emails, phone numbers and card numbers', () => {
    expect(redactPII('mail a@b.io or call 555-987-6543, card 4111 1111 1111 1111')).toBe(
      'mail [EMAIL] or call [PHONE], card [CARD]'
    );
  });
});

describe('Logger', () => {
  it('should redact message and metadata', () => {
    const { logger, lines } = createLogger();
    logger.info('Found a@b.io', { values: ['555-987-6543'] });

    expect(lines).toHaveLength(1);
    const entry = parseLine(lines[0]);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('Found [EMAIL]');
    expect(entry.metadata).toEqual({ values: ['[PHONE]'] });
  });

  it('should keep values when redaction is off', () => {
    const { logger, lines } = createLogger({ redactPII: false });
    logger.info('Found a@b.io');
    expect(parseLine(lines[0]).message).toBe('Found a@b.io');
  });

  it('should drop entries below the minimum level', () => {
    const { logger, lines } = createLogger({ level: 'warn' });
    logger.info('quiet');
    logger.debug('quieter');
    expect(lines).toHaveLength(0);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should carry child context', () => {
    const { logger, lines } = createLogger();
    logger.child({ component: 'engine' }).warn('slow pattern');
    expect(parseLine(lines[0]).component).toBe('engine');
  });

  it('should redact error messages and drop stacks', () => {
    const { logger, lines } = createLogger();
    logger.error('failed', new Error('bad a@b.io'));
    expect(parseLine(lines[0]).error).toEqual({ name: 'Error', message: 'bad [EMAIL]' });
  });

  it('should render pretty lines with the component', () => {
    const { logger, lines } = createLogger({ format: 'pretty' });
    logger.child({ component: 'engine' }).info('hello');
    expect(lines[0]).toContain('INFO');
    expect(lines[0]).toContain('[engine] hello');
  });
});

describe('root logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
    resetLogger();
  });

  it('should fall back to defaults when the environment does not validate', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    resetConfig();

    const logger = new Logger();

    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  it('should take settings from configureLogger', () => {
    const lines: string[] = [];
    configureLogger({ level: 'info', format: 'json', redactPII: false, write: line => lines.push(line) });

    loggers.cli().info('Found a@b.io');

    const entry = parseLine(lines[0]);
    expect(entry.component).toBe('cli');
    expect(entry.message).toBe('Found a@b.io');
  });
});
