// ═══════════════════════════════════════════════════════════════════════════════
// PATTERN REGISTRY — Immutable, Ordered Set of Compiled Recognition Rules
// ═══════════════════════════════════════════════════════════════════════════════
//
// The registry is built once at startup and shared read-only. Every compile
// problem surfaces here as a PatternCompileError; the engine never sees a
// pattern that failed to build.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { PatternCompileError } from '../types/errors.js';
import { loggers } from '../logging/index.js';
import { BUILT_IN_PATTERNS, NORMALIZERS } from './patterns.js';
import {
  CATEGORY_NAME_PATTERN,
  type Category,
  type Normalizer,
  type PatternDefinition,
  type PatternRegistry,
  type PatternSpec,
} from './types.js';

const ALLOWED_FLAGS = new Set(['i', 'm', 's', 'u']);

// ─────────────────────────────────────────────────────────────────────────────────
// COMPILATION
// ─────────────────────────────────────────────────────────────────────────────────

function resolveFlags(definition: PatternDefinition): string {
  const flags = new Set<string>(['g']);

  const inherited = definition.pattern instanceof RegExp ? definition.pattern.flags : '';
  for (const flag of inherited + (definition.flags ?? '')) {
    if (flag === 'g') continue;
    if (!ALLOWED_FLAGS.has(flag)) {
      throw new PatternCompileError(
        `Unsupported flag "${flag}" for category "${definition.category}"`,
        { category: definition.category }
      );
    }
    flags.add(flag);
  }

  if (definition.caseInsensitive) {
    flags.add('i');
  }

  return [...flags].sort().join('');
}

function resolveNormalizer(definition: PatternDefinition): Normalizer | undefined {
  const { normalize } = definition;
  if (normalize === undefined) return undefined;
  if (typeof normalize === 'function') return normalize;

  const named = NORMALIZERS[normalize];
  if (!named) {
    throw new PatternCompileError(
      `Unknown normalizer "${String(normalize)}" for category "${definition.category}"`,
      { category: definition.category }
    );
  }
  return named;
}

/**
 * Compile a single definition into a frozen PatternSpec.
 */
export function compilePattern(definition: PatternDefinition): PatternSpec {
  const { category } = definition;

  if (!CATEGORY_NAME_PATTERN.test(category)) {
    throw new PatternCompileError(
      `Invalid category name "${category}": use lowercase letters, digits and underscores`,
      { category }
    );
  }

  const source = definition.pattern instanceof RegExp ? definition.pattern.source : definition.pattern;
  if (source.length === 0) {
    throw new PatternCompileError(`Empty pattern for category "${category}"`, { category, pattern: source });
  }

  const flags = resolveFlags(definition);

  let matcher: RegExp;
  try {
    matcher = new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompileError(
      `Pattern for category "${category}" does not compile: ${reason}`,
      { category, pattern: source, cause: error }
    );
  }

  return Object.freeze({
    category,
    matcher,
    caseInsensitive: flags.includes('i'),
    description: definition.description,
    normalize: resolveNormalizer(definition),
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

class FrozenPatternRegistry implements PatternRegistry {
  private readonly patterns: readonly PatternSpec[];
  private readonly byCategory: ReadonlyMap<Category, PatternSpec>;

  constructor(patterns: readonly PatternSpec[]) {
    this.patterns = Object.freeze([...patterns]);
    this.byCategory = new Map(patterns.map(spec => [spec.category, spec]));
  }

  getPatterns(): readonly PatternSpec[] {
    return this.patterns;
  }

  categories(): readonly Category[] {
    return this.patterns.map(spec => spec.category);
  }

  get(category: Category): PatternSpec | undefined {
    return this.byCategory.get(category);
  }

  /**
   * Restrict to the named categories, keeping registry order.
   */
  select(categories: readonly Category[]): PatternRegistry {
    const unknown = categories.filter(category => !this.byCategory.has(category));
    if (unknown.length > 0) {
      throw new PatternCompileError(
        `Unknown categories: ${unknown.join(', ')} (available: ${this.categories().join(', ')})`,
        { category: unknown[0] }
      );
    }

    const wanted = new Set(categories);
    return new FrozenPatternRegistry(this.patterns.filter(spec => wanted.has(spec.category)));
  }
}

/**
 * Compile definitions into a registry. Categories must be unique.
 */
export function createRegistry(definitions: readonly PatternDefinition[]): PatternRegistry {
  const seen = new Set<Category>();
  const specs: PatternSpec[] = [];

  for (const definition of definitions) {
    if (seen.has(definition.category)) {
      throw new PatternCompileError(
        `Duplicate category "${definition.category}"`,
        { category: definition.category }
      );
    }
    seen.add(definition.category);
    specs.push(compilePattern(definition));
  }

  loggers.registry().debug('Pattern registry built', { categories: [...seen] });
  return new FrozenPatternRegistry(specs);
}

/**
 * Built-in patterns followed by custom ones. A custom definition that reuses a
 * built-in category replaces it in place.
 */
export function createDefaultRegistry(custom: readonly PatternDefinition[] = []): PatternRegistry {
  const overrides = new Map<Category, PatternDefinition>();
  const additions: PatternDefinition[] = [];
  const builtInNames = new Set<Category>(BUILT_IN_PATTERNS.map(definition => definition.category));

  for (const definition of custom) {
    if (builtInNames.has(definition.category) && !overrides.has(definition.category)) {
      overrides.set(definition.category, definition);
    } else {
      additions.push(definition);
    }
  }

  const merged = BUILT_IN_PATTERNS.map(definition => overrides.get(definition.category) ?? definition);
  return createRegistry([...merged, ...additions]);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON
// ─────────────────────────────────────────────────────────────────────────────────

let defaultRegistry: PatternRegistry | null = null;

export function getDefaultRegistry(): PatternRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry();
  }
  return defaultRegistry;
}

/**
 * Patterns of the built-in registry, in order.
 */
export function getPatterns(): readonly PatternSpec[] {
  return getDefaultRegistry().getPatterns();
}
