// ═══════════════════════════════════════════════════════════════════════════════
// SOURCES MODULE — Where Extraction Text Comes From
// ═══════════════════════════════════════════════════════════════════════════════

export type { TextSource } from './types.js';
export { FileTextSource, StringTextSource } from './file.js';
export { PromptTextSource, DEFAULT_PROMPT } from './prompt.js';
export { SampleTextSource, SAMPLE_TEXT } from './sample.js';
