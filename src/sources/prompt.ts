// ═══════════════════════════════════════════════════════════════════════════════
// PROMPT SOURCE — Reads One Line of Text from an Interactive Stream
// ═══════════════════════════════════════════════════════════════════════════════

import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { SourceUnavailableError } from '../types/errors.js';
import { err, ok, type AsyncResult } from '../types/result.js';
import type { TextSource } from './types.js';

export const DEFAULT_PROMPT = 'Enter text to extract from (leave empty for sample data): ';

export class PromptTextSource implements TextSource {
  readonly id = 'prompt';
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly prompt: string;

  constructor(input: Readable, output: Writable, prompt: string = DEFAULT_PROMPT) {
    this.input = input;
    this.output = output;
    this.prompt = prompt;
  }

  /**
   * Resolves to the entered line; the stream closing first is an error.
   */
  async read(): AsyncResult<string, SourceUnavailableError> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });

    try {
      const answer = await new Promise<string | null>((resolve, reject) => {
        rl.once('close', () => resolve(null));
        rl.question(this.prompt).then(resolve, reject);
      });

      if (answer === null) {
        return err(new SourceUnavailableError(this.id, 'input closed before any text was entered'));
      }
      return ok(answer.trim());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new SourceUnavailableError(this.id, reason, error));
    } finally {
      rl.close();
    }
  }
}
