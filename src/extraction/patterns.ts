// ═══════════════════════════════════════════════════════════════════════════════
// BUILT-IN PATTERNS — Recognition Rules for the Seven Default Categories
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each pattern is written without the g flag; the registry adds it when
// compiling. Order here is registry order, which is also report order.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Normalizer, NormalizerName, PatternDefinition } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZERS
// ─────────────────────────────────────────────────────────────────────────────────

export const NORMALIZERS: Record<NormalizerName, Normalizer> = {
  lowercase: (value) => value.toLowerCase(),
  uppercase: (value) => value.toUpperCase(),
  // 3:00pm -> 3:00PM; the space before the suffix is kept as written
  meridiem: (value) => value.replace(/[ap]m$/i, (suffix) => suffix.toUpperCase()),
};

// ─────────────────────────────────────────────────────────────────────────────────
// CURRENCY
// ─────────────────────────────────────────────────────────────────────────────────

export const CURRENCY_CODES = [
  'USD', 'EUR', 'GBP', 'JPY', 'CAD', 'AUD', 'CHF', 'CNY', 'INR',
  'MXN', 'NZD', 'SEK', 'NOK', 'DKK', 'SGD', 'HKD', 'ZAR', 'BRL',
] as const;

// 1,234,567 or 1234567, optional cents
const AMOUNT = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?`;

const CURRENCY_PATTERN = new RegExp(
  String.raw`[$£€]${AMOUNT}(?!\d|[.,]\d)` +
  '|' +
  String.raw`\b${AMOUNT} ?(?:${CURRENCY_CODES.join('|')})\b`
);

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERN TABLE
// ─────────────────────────────────────────────────────────────────────────────────

export const BUILT_IN_PATTERNS: readonly PatternDefinition[] = [
  {
    category: 'email',
    description: 'local-part@domain.tld',
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}\b/,
  },
  {
    category: 'url',
    description: 'http(s) URL up to whitespace, a closing bracket, comma or quote',
    pattern: /https?:\/\/[^\s)\]}>,"']+/,
  },
  {
    category: 'phone',
    description: 'North American number, optionally prefixed by +1',
    // Unanchored: ten digits inside a longer run (e.g. a card number) still count
    pattern: /(?:\+1 )?(?:\(\d{3}\) \d{3}-\d{4}|\d{3}-\d{3}-\d{4}|\d{3}\.\d{3}\.\d{4}|\d{10})/,
  },
  {
    category: 'credit_card',
    description: 'Four groups of four digits, or sixteen contiguous digits',
    pattern: /\b(?:\d{4}[ -]){3}\d{4}\b|\b\d{16}\b/,
  },
  {
    category: 'time',
    description: '12-hour time with AM/PM, or 24-hour HH:MM[:SS]',
    // A 24-hour reading is refused when a meridiem follows, so "13:00 PM" is not a time
    pattern: /\b(?:(?:0?[1-9]|1[0-2]):[0-5]\d(?::[0-5]\d)? ?[ap]m\b|(?:[01]?\d|2[0-3]):[0-5]\d(?::[0-5]\d)?\b(?! ?[ap]m\b))/,
    caseInsensitive: true,
    normalize: 'meridiem',
  },
  {
    category: 'hashtag',
    description: '#word, not part of a ## run',
    pattern: /(?<!#)#[A-Za-z0-9_]+/,
  },
  {
    category: 'currency',
    description: 'Symbol-prefixed amount or amount followed by an ISO code',
    pattern: CURRENCY_PATTERN,
  },
];
