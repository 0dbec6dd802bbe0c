// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION ENGINE — Applies Every Registry Pattern to a Text
// ═══════════════════════════════════════════════════════════════════════════════
//
// Categories are scanned independently: a substring may be claimed by several
// categories and no overlap between categories is resolved here. Results are
// unique per category and sorted by plain string comparison, so times and
// amounts are not in chronological or numeric order.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getDefaultRegistry } from './registry.js';
import type { Category, MatchSet, PatternRegistry, PatternSpec } from './types.js';

/**
 * Sort by UTF-16 code units, the default string order.
 */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * All non-overlapping matches of one pattern, normalized, unique and sorted.
 */
export function extractCategory(text: string, spec: PatternSpec): readonly string[] {
  const unique = new Set<string>();

  // matchAll clones the matcher, so the shared registry regex is untouched
  for (const match of text.matchAll(spec.matcher)) {
    const raw = match[0];
    if (raw.length === 0) continue;
    unique.add(spec.normalize ? spec.normalize(raw) : raw);
  }

  return [...unique].sort(compareStrings);
}

export function extract(text: string, registry: PatternRegistry = getDefaultRegistry()): MatchSet {
  const matches = new Map<Category, readonly string[]>();

  for (const spec of registry.getPatterns()) {
    matches.set(spec.category, extractCategory(text, spec));
  }

  return matches;
}
