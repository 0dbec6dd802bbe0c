// ═══════════════════════════════════════════════════════════════════════════════
// TEXT SOURCE TESTS — File, Inline, Prompt, Sample
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import {
  FileTextSource,
  PromptTextSource,
  SAMPLE_TEXT,
  SampleTextSource,
  StringTextSource,
} from '../sources/index.js';
import { SourceUnavailableError } from '../types/errors.js';

describe('FileTextSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'token-extract-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read the file and use its path as id', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'Ping ops@example.org');

    const source = new FileTextSource(path);
    const result = await source.read();

    expect(source.id).toBe(path);
    expect(result).toEqual({ ok: true, value: 'Ping ops@example.org' });
  });

  it('should return SourceUnavailableError for a missing file', async () => {
    const path = join(dir, 'missing.txt');
    const result = await new FileTextSource(path).read();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SourceUnavailableError);
    expect(result.error.sourceId).toBe(path);
  });

  it('should allow empty files', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, '');
    expect(await new FileTextSource(path).read()).toEqual({ ok: true, value: '' });
  });

  describe('SampleTextSource', () => {
    it('should write the sample file and read it back', async () => {
      const path = join(dir, 'sample_data.txt');
      const result = await new SampleTextSource(path).read();

      expect(result).toEqual({ ok: true, value: SAMPLE_TEXT });
      expect(await readFile(path, 'utf8')).toBe(SAMPLE_TEXT);
    });

    it('should report a sample path that cannot be written', async () => {
      const result = await new SampleTextSource(join(dir, 'missing', 'sample.txt')).read();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
    });
  });
});

describe('StringTextSource', () => {
  it('should return its text with the inline id', async () => {
    const source = new StringTextSource('#hello');
    expect(source.id).toBe('inline');
    expect(await source.read()).toEqual({ ok: true, value: '#hello' });
  });
});

describe('PromptTextSource', () => {
  it('should return the entered line', async () => {
    const input = new PassThrough();
    input.end('call 555-987-6543\n');

    const result = await new PromptTextSource(input, new PassThrough()).read();

    expect(result).toEqual({ ok: true, value: 'call 555-987-6543' });
  });

  it('should trim a blank answer to empty text', async () => {
    const input = new PassThrough();
    input.end('   \n');

    expect(await new PromptTextSource(input, new PassThrough()).read()).toEqual({ ok: true, value: '' });
  });

  it('should fail when the input closes without an answer', async () => {
    const input = new PassThrough();
    input.end();

    const result = await new PromptTextSource(input, new PassThrough()).read();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SourceUnavailableError);
    expect(result.error.sourceId).toBe('prompt');
  });
});
