// ═══════════════════════════════════════════════════════════════════════════════
// RESULT AGGREGATOR — Builds the Immutable Result Record
// ═══════════════════════════════════════════════════════════════════════════════

import type { MatchSet, ResultRecord } from './types.js';

/**
 * Wrap a match set into a record with per-category counts and a total.
 * Every category of the match set is present, including empty ones.
 */
export function aggregate(source: string, matchSet: MatchSet): ResultRecord {
  const perCategory: Record<string, readonly string[]> = {};
  const counts: Record<string, number> = {};
  let totalMatches = 0;

  for (const [category, values] of matchSet) {
    const copy = Object.freeze([...values]);
    perCategory[category] = copy;
    counts[category] = copy.length;
    totalMatches += copy.length;
  }

  return Object.freeze({
    source,
    perCategory: Object.freeze(perCategory),
    counts: Object.freeze(counts),
    totalMatches,
  });
}
