// ═══════════════════════════════════════════════════════════════════════════════
// TEXT SOURCE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

import type { SourceUnavailableError } from '../types/errors.js';
import type { AsyncResult } from '../types/result.js';

/**
 * Supplies the full text of one extraction run. The text may be empty;
 * decoding problems belong to the source, never to the engine.
 */
export interface TextSource {
  /** Identifier carried into the result record and the output file name */
  readonly id: string;
  read(): AsyncResult<string, SourceUnavailableError>;
}
