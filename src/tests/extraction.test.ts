// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION ENGINE TESTS — Patterns, Dedup, Ordering, Overlap
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, afterEach, vi } from 'vitest';
import { resetConfig } from '../config/index.js';
import {
  BUILT_IN_CATEGORIES,
  createDefaultRegistry,
  extract,
  extractCategory,
  type MatchSet,
} from '../extraction/index.js';
import { resetLogger } from '../logging/index.js';
import { SAMPLE_TEXT } from '../sources/sample.js';

const registry = createDefaultRegistry();

function matchesOf(text: string, category: string): readonly string[] | undefined {
  return extract(text, registry).get(category);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CANONICAL EXAMPLES
// ─────────────────────────────────────────────────────────────────────────────────

describe('extract — canonical examples', () => {
  it('should find emails in lexicographic order', () => {
    const emails = matchesOf('Contact us at support@company.com or sales@business.co.uk', 'email');
    expect(emails).toEqual(['sales@business.co.uk', 'support@company.com']);
  });

  it('should find urls verbatim', () => {
    const urls = matchesOf('Visit https://www.example.com or https://blog.example.org/posts', 'url');
    expect(urls).toEqual(['https://blog.example.org/posts', 'https://www.example.com']);
  });

  it('should keep phone numbers in their original formatting', () => {
    const phones = matchesOf('Call (555) 123-4567 or 555-987-6543 or 555.111.2222', 'phone');
    expect(phones).toEqual(['(555) 123-4567', '555-987-6543', '555.111.2222']);
  });

  it('should find both 12-hour and 24-hour times', () => {
    expect(matchesOf('Meeting at 3:00 PM and 14:30', 'time')).toEqual(['14:30', '3:00 PM']);
  });

  it('should find hashtags', () => {
    expect(matchesOf('#MondayMotivation and #AI', 'hashtag')).toEqual(['#AI', '#MondayMotivation']);
  });

  it('should find symbol and code currency values', () => {
    expect(matchesOf('Price: $1,200.50 or 500 USD', 'currency')).toEqual(['$1,200.50', '500 USD']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CATEGORY DETAILS
// ─────────────────────────────────────────────────────────────────────────────────

describe('extract — category details', () => {
  it('should accept a +1 prefix and ten contiguous digits as phones', () => {
    expect(matchesOf('Dial +1 (555) 123-4567 or 5551234567', 'phone')).toEqual([
      '+1 (555) 123-4567',
      '5551234567',
    ]);
  });

  it('should report a 16-digit card number as a card and a phone', () => {
    const result = extract('Card 4111111111111111 end', registry);
    expect(result.get('credit_card')).toEqual(['4111111111111111']);
    expect(result.get('phone')).toEqual(['4111111111']);
  });

  it('should find card numbers with spaces, hyphens or no separators', () => {
    const cards = matchesOf(
      '4111 1111 1111 1111 and 4111-1111-1111-1111 and 4111111111111111',
      'credit_card'
    );
    expect(cards).toEqual(['4111 1111 1111 1111', '4111-1111-1111-1111', '4111111111111111']);
  });

  it('should read seconds in both time forms', () => {
    expect(matchesOf('Backup at 23:59:59, restart 12:30:15 AM', 'time')).toEqual([
      '12:30:15 AM',
      '23:59:59',
    ]);
  });

  it('should refuse a 24-hour time followed by a meridiem', () => {
    expect(matchesOf('Invalid 13:00 PM', 'time')).toEqual([]);
  });

  it('should ignore doubled hash marks', () => {
    expect(matchesOf('##notatag and #ok', 'hashtag')).toEqual(['#ok']);
  });

  it('should stop urls before closing brackets and commas', () => {
    const urls = matchesOf('(see https://example.com/a), or https://example.com/b,', 'url');
    expect(urls).toEqual(['https://example.com/a', 'https://example.com/b']);
  });

  it('should find pound, euro and ISO-coded amounts', () => {
    const values = matchesOf('€300 and £45.99 and 1,000,000 EUR', 'currency');
    expect(values).toEqual(['1,000,000 EUR', '£45.99', '€300']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION & ORDERING
// ─────────────────────────────────────────────────────────────────────────────────

describe('extract — normalization and ordering', () => {
  it('should deduplicate identical matches', () => {
    expect(matchesOf('a@b.io wrote to a@b.io', 'email')).toEqual(['a@b.io']);
  });

  it('should uppercase the meridiem before deduplicating', () => {
    // "3:00 pm" keeps its space, so it stays distinct from "3:00PM"
    expect(matchesOf('3:00pm then 3:00PM then 3:00 pm', 'time')).toEqual(['3:00 PM', '3:00PM']);
  });

  it('should sort times as strings, not chronologically', () => {
    expect(matchesOf('at 9:00 and 10:00', 'time')).toEqual(['10:00', '9:00']);
  });

  it('should sort amounts as strings, not numerically', () => {
    expect(matchesOf('$5 and $40', 'currency')).toEqual(['$40', '$5']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// PROPERTIES
// ─────────────────────────────────────────────────────────────────────────────────

describe('extract — properties', () => {
  it('should return every category, empty, for empty input', () => {
    const result = extract('', registry);
    expect([...result.keys()]).toEqual([...BUILT_IN_CATEGORIES]);
    for (const values of result.values()) {
      expect(values).toEqual([]);
    }
  });

  it('should be idempotent', () => {
    const first: MatchSet = extract(SAMPLE_TEXT, registry);
    const second: MatchSet = extract(SAMPLE_TEXT, registry);
    expect([...second.entries()]).toEqual([...first.entries()]);
  });

  it('should find every category in the sample text', () => {
    const result = extract(SAMPLE_TEXT, registry);
    expect(result.get('time')).toEqual(['09:15', '14:30', '4:00PM', '5:30 PM']);
    expect(result.get('phone')).toEqual(['(555) 123-4567', '+1 555.111.2222', '555-987-6543']);
    expect(result.get('credit_card')).toEqual(['4111 1111 1111 1111']);
    expect(result.get('currency')).toEqual(['$1,200.50', '500 USD', '€300']);
  });

  it('should let a substring be claimed by several categories', () => {
    const result = extract('See https://shop.example.com/#Sale today', registry);
    expect(result.get('url')).toEqual(['https://shop.example.com/#Sale']);
    expect(result.get('hashtag')).toEqual(['#Sale']);
  });

  it('should report the same string under every category that matches it', () => {
    const withDigits = createDefaultRegistry([{ category: 'ten_digits', pattern: '\\b\\d{10}\\b' }]);
    const result = extract('Dial 5551234567 now', withDigits);
    expect(result.get('phone')).toEqual(['5551234567']);
    expect(result.get('ten_digits')).toEqual(['5551234567']);
  });

  it('should leave the shared matcher untouched', () => {
    const spec = registry.get('email');
    expect(spec).toBeDefined();
    if (!spec) return;

    extractCategory('one@a.io two@b.io', spec);
    expect(spec.matcher.lastIndex).toBe(0);
  });

  it('should use the default registry when none is given', () => {
    expect(extract('#solo').get('hashtag')).toEqual(['#solo']);
  });
});

describe('extract — environment independence', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
    resetLogger();
  });

  it('should extract when the logging environment does not validate', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    resetConfig();
    resetLogger();

    expect(extract('#ok', createDefaultRegistry()).get('hashtag')).toEqual(['#ok']);
  });
});
