// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM PATTERNS — JSON Pattern Definitions Validated with Zod
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { PatternCompileError, SourceUnavailableError } from '../types/errors.js';
import { CATEGORY_NAME_PATTERN, type PatternDefinition } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One custom pattern.
 *
 * @example
 * {
 *   "category": "ticket",
 *   "pattern": "\\bJIRA-\\d+\\b",
 *   "normalize": "uppercase",
 *   "caseInsensitive": true
 * }
 */
export const CustomPatternSchema = z
  .object({
    category: z
      .string()
      .regex(CATEGORY_NAME_PATTERN, 'Category must be lowercase letters, digits and underscores'),
    pattern: z.string().min(1, 'Pattern is required'),
    flags: z.string().regex(/^[imsu]*$/, 'Flags may only contain i, m, s, u').optional(),
    caseInsensitive: z.boolean().optional(),
    description: z.string().max(200).optional(),
    normalize: z.enum(['lowercase', 'uppercase', 'meridiem']).optional(),
  })
  .strict();

/**
 * A bare array, or an object with a `patterns` array.
 */
export const CustomPatternFileSchema = z.union([
  z.array(CustomPatternSchema),
  z.object({ patterns: z.array(CustomPatternSchema) }).strict(),
]);

export type CustomPattern = z.infer<typeof CustomPatternSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

export function parseCustomPatterns(input: unknown, origin: string = 'custom patterns'): PatternDefinition[] {
  const parsed = CustomPatternFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PatternCompileError(`Invalid ${origin}: ${issues}`, { cause: parsed.error });
  }

  const patterns = Array.isArray(parsed.data) ? parsed.data : parsed.data.patterns;
  return patterns.map(pattern => ({ ...pattern }));
}

/**
 * Read and validate a custom pattern file. Compilation happens later, when the
 * definitions are handed to the registry.
 */
export async function loadCustomPatterns(path: string): Promise<PatternDefinition[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SourceUnavailableError(path, reason, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompileError(`Pattern file ${path} is not valid JSON: ${reason}`, { cause: error });
  }

  return parseCustomPatterns(json, `pattern file ${path}`);
}
