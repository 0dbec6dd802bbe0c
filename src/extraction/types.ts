// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TYPES — Patterns, Match Sets and Result Records
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CATEGORIES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Built-in categories, in registry order.
 */
export const BUILT_IN_CATEGORIES = [
  'email',
  'url',
  'phone',
  'credit_card',
  'time',
  'hashtag',
  'currency',
] as const;

export type BuiltInCategory = typeof BUILT_IN_CATEGORIES[number];

/**
 * Category names are open so that custom patterns can add their own.
 */
export type Category = BuiltInCategory | (string & {});

export const CATEGORY_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERN DEFINITIONS
// ─────────────────────────────────────────────────────────────────────────────────

export type NormalizerName = 'lowercase' | 'uppercase' | 'meridiem';

export type Normalizer = (value: string) => string;

/**
 * Uncompiled pattern, as written in the built-in table or a custom JSON file.
 */
export interface PatternDefinition {
  category: Category;
  pattern: string | RegExp;
  /** Extra RegExp flags (i, m, s, u); g is always added */
  flags?: string;
  caseInsensitive?: boolean;
  description?: string;
  normalize?: NormalizerName | Normalizer;
}

/**
 * Compiled, frozen rule pairing a category with its matcher.
 */
export interface PatternSpec {
  readonly category: Category;
  /** Always carries the g flag */
  readonly matcher: RegExp;
  readonly caseInsensitive: boolean;
  readonly description?: string;
  readonly normalize?: Normalizer;
}

export interface PatternRegistry {
  getPatterns(): readonly PatternSpec[];
  categories(): readonly Category[];
  get(category: Category): PatternSpec | undefined;
  select(categories: readonly Category[]): PatternRegistry;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESULTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Every registry category in registry order, each list unique and sorted.
 */
export type MatchSet = ReadonlyMap<Category, readonly string[]>;

export interface ResultRecord {
  readonly source: string;
  /** Keyed by category, in registry order */
  readonly perCategory: Readonly<Record<string, readonly string[]>>;
  readonly counts: Readonly<Record<string, number>>;
  readonly totalMatches: number;
}
