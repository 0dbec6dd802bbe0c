// ═══════════════════════════════════════════════════════════════════════════════
// SAMPLE SOURCE — Writes Fixed Demo Text to Disk and Reads It Back
// ═══════════════════════════════════════════════════════════════════════════════

import { writeFile } from 'node:fs/promises';
import { loggers } from '../logging/index.js';
import { SourceUnavailableError } from '../types/errors.js';
import { err, type AsyncResult } from '../types/result.js';
import { FileTextSource } from './file.js';
import type { TextSource } from './types.js';

/**
 * Demo content with at least one token of every built-in category.
 */
export const SAMPLE_TEXT = [
  'Quarterly sync notes',
  'Contact support@company.com or sales@business.co.uk with questions.',
  'Docs live at https://www.example.com/docs and https://blog.example.org/posts for reference.',
  'Call (555) 123-4567, 555-987-6543 or +1 555.111.2222 before 5:30 PM.',
  'The standup moved from 09:15 to 14:30; the retro starts at 4:00pm.',
  'Card on file: 4111 1111 1111 1111 (expires soon).',
  'Budget: $1,200.50 for tooling, €300 for travel and 500 USD for snacks.',
  'Tags: #MondayMotivation #AI #data_extraction',
  '',
].join('\n');

export class SampleTextSource implements TextSource {
  readonly id: string;
  private readonly path: string;

  constructor(path: string = 'sample_data.txt') {
    this.path = path;
    this.id = path;
  }

  async read(): AsyncResult<string, SourceUnavailableError> {
    try {
      await writeFile(this.path, SAMPLE_TEXT, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new SourceUnavailableError(this.path, `could not write sample data: ${reason}`, error));
    }

    loggers.source().info('Sample data written', { path: this.path });
    return new FileTextSource(this.path).read();
  }
}
