// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION MODULE — Registry, Engine, Aggregator
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  BuiltInCategory,
  Category,
  MatchSet,
  Normalizer,
  NormalizerName,
  PatternDefinition,
  PatternRegistry,
  PatternSpec,
  ResultRecord,
} from './types.js';

// Constants
export { BUILT_IN_CATEGORIES, CATEGORY_NAME_PATTERN } from './types.js';
export { BUILT_IN_PATTERNS, CURRENCY_CODES, NORMALIZERS } from './patterns.js';

// Registry
export {
  compilePattern,
  createRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  getPatterns,
} from './registry.js';

// Custom patterns
export {
  CustomPatternSchema,
  CustomPatternFileSchema,
  parseCustomPatterns,
  loadCustomPatterns,
  type CustomPattern,
} from './custom-patterns.js';

// Engine & aggregation
export { extract, extractCategory } from './engine.js';
export { aggregate } from './aggregator.js';
