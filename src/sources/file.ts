// ═══════════════════════════════════════════════════════════════════════════════
// FILE & INLINE SOURCES
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { loggers } from '../logging/index.js';
import { SourceUnavailableError } from '../types/errors.js';
import { mapErr, ok, tryCatchAsync, type AsyncResult } from '../types/result.js';
import type { TextSource } from './types.js';

export class FileTextSource implements TextSource {
  readonly id: string;
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
    this.id = path;
  }

  async read(): AsyncResult<string, SourceUnavailableError> {
    const result = await tryCatchAsync(() => readFile(this.path, 'utf8'));

    if (result.ok) {
      loggers.source().debug('File read', { path: this.path, length: result.value.length });
    } else {
      loggers.source().warn('File unavailable', { path: this.path, reason: result.error.message });
    }

    return mapErr(result, error => new SourceUnavailableError(this.path, error.message, error));
  }
}

/**
 * Text handed over directly, e.g. from --text.
 */
export class StringTextSource implements TextSource {
  readonly id: string;
  private readonly text: string;

  constructor(text: string, id: string = 'inline') {
    this.text = text;
    this.id = id;
  }

  async read(): AsyncResult<string, SourceUnavailableError> {
    return ok(this.text);
  }
}
