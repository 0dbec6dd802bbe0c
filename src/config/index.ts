// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for Extraction, Output and Logging
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

type Env = Record<string, string | undefined>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(env: Env, key: string, defaultValue: boolean = false): boolean {
  const value = env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function envOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function envList(env: Env, key: string, defaultValue: string[] = []): string[] {
  const value = env[key];
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
export const LogFormatSchema = z.enum(['pretty', 'json']);

export const ExtractorConfigSchema = z.object({
  output: z.object({
    directory: z.string().min(1, 'Output directory must not be empty'),
    prettyJson: z.boolean(),
  }),
  extraction: z.object({
    // Empty = every registered category
    categories: z.array(z.string().regex(/^[a-z][a-z0-9_]*$/, 'Invalid category name')),
    patternsFile: z.string().min(1).optional(),
    sampleFile: z.string().min(1, 'Sample file path must not be empty'),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    redactPII: z.boolean(),
  }),
});

export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when environment values do not satisfy the config schema.
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build (uncached) configuration from an environment map.
 */
export function parseConfig(env: Env = process.env): ExtractorConfig {
  const debugMode = envBool(env, 'DEBUG', false);

  const raw = {
    output: {
      directory: envString(env, 'EXTRACTOR_OUTPUT_DIR', '.'),
      prettyJson: envBool(env, 'EXTRACTOR_PRETTY_JSON', true),
    },
    extraction: {
      categories: envList(env, 'EXTRACTOR_CATEGORIES'),
      patternsFile: envOptional(env, 'EXTRACTOR_PATTERNS_FILE'),
      sampleFile: envString(env, 'EXTRACTOR_SAMPLE_FILE', 'sample_data.txt'),
    },
    logging: {
      level: envString(env, 'LOG_LEVEL', debugMode ? 'debug' : 'warn').toLowerCase(),
      format: envString(env, 'LOG_FORMAT', 'pretty').toLowerCase(),
      redactPII: envBool(env, 'REDACT_PII', true),
    },
  };

  const parsed = ExtractorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatConfigErrors(parsed.error));
  }
  return parsed.data;
}

let cachedConfig: ExtractorConfig | null = null;

export function loadConfig(): ExtractorConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

export function reloadConfig(): ExtractorConfig {
  cachedConfig = null;
  return loadConfig();
}

export function resetConfig(): void {
  cachedConfig = null;
}
