// ═══════════════════════════════════════════════════════════════════════════════
// RESULT SINK — Persists a Result Record as results_<name>.json
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import type { ResultRecord } from '../extraction/types.js';
import { loggers } from '../logging/index.js';
import { SinkWriteError } from '../types/errors.js';
import { mapErr, tryCatchAsync, type AsyncResult } from '../types/result.js';
import { JsonFormatter } from './formatters.js';
import type { FileSinkConfig, ResultSink } from './types.js';

/**
 * results_<basename>.json, where basename drops directory and extension.
 *
 * @example
 * resultsFileName('notes/sample_data.txt') // 'results_sample_data.json'
 */
export function resultsFileName(source: string): string {
  const name = parse(source.trim()).name.replace(/[^A-Za-z0-9._-]/g, '_');
  return `results_${name || 'input'}.json`;
}

export class JsonFileSink implements ResultSink {
  private readonly config: FileSinkConfig;
  private readonly formatter = new JsonFormatter();

  constructor(config: Partial<FileSinkConfig> = {}) {
    this.config = {
      directory: config.directory ?? '.',
      prettyPrint: config.prettyPrint ?? true,
    };
  }

  destinationFor(record: ResultRecord): string {
    return join(this.config.directory, resultsFileName(record.source));
  }

  /**
   * Write once; failures are returned and not retried.
   */
  async write(record: ResultRecord): AsyncResult<string, SinkWriteError> {
    const destination = this.destinationFor(record);
    const content = this.formatter.format(record, { prettyPrint: this.config.prettyPrint });
    const logger = loggers.sink();

    const written = await tryCatchAsync(async () => {
      await mkdir(this.config.directory, { recursive: true });
      await writeFile(destination, `${content}\n`, 'utf8');
      return destination;
    });

    if (written.ok) {
      logger.info('Results written', { destination, totalMatches: record.totalMatches });
    } else {
      logger.error('Results could not be written', written.error, { destination });
    }

    return mapErr(written, error => new SinkWriteError(destination, error.message, error));
  }
}
