// ═══════════════════════════════════════════════════════════════════════════════
// CLI DRIVER — Source Selection, One Extraction Run, Report and Sink
// ═══════════════════════════════════════════════════════════════════════════════
//
// Exit codes:
//   0  success
//   1  text source or results file failure
//   2  usage, configuration or pattern error
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Readable, Writable } from 'node:stream';
import { ConfigError, loadConfig, type ExtractorConfig } from '../config/index.js';
import { aggregate } from '../extraction/aggregator.js';
import { loadCustomPatterns } from '../extraction/custom-patterns.js';
import { extract } from '../extraction/engine.js';
import { createDefaultRegistry } from '../extraction/registry.js';
import type { PatternDefinition, PatternRegistry } from '../extraction/types.js';
import { getFormatter } from '../export/formatters.js';
import { JsonFileSink } from '../export/sink.js';
import { configureLogger, loggers } from '../logging/index.js';
import { FileTextSource, StringTextSource } from '../sources/file.js';
import { PromptTextSource } from '../sources/prompt.js';
import { SampleTextSource } from '../sources/sample.js';
import type { TextSource } from '../sources/types.js';
import { PatternCompileError, SourceUnavailableError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { parseArgs, USAGE, type CliOptions } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  /** Whether stdin is a terminal a person can type into */
  isInteractive: boolean;
}

export interface CliDependencies {
  io: CliIO;
  /** Defaults to loadConfig() */
  config?: ExtractorConfig;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STEPS
// ─────────────────────────────────────────────────────────────────────────────────

async function buildRegistry(
  options: CliOptions,
  config: ExtractorConfig
): Promise<PatternRegistry> {
  const patternsFile = options.patternsFile ?? config.extraction.patternsFile;
  const custom: PatternDefinition[] = patternsFile ? await loadCustomPatterns(patternsFile) : [];

  const registry = createDefaultRegistry(custom);

  const categories = options.categories ?? config.extraction.categories;
  return categories.length > 0 ? registry.select(categories) : registry;
}

/**
 * Read from the chosen source. Only an explicit file fails hard; the prompt
 * falls back to the sample when it yields nothing.
 */
async function readText(
  options: CliOptions,
  config: ExtractorConfig,
  io: CliIO
): Promise<Result<{ id: string; text: string }, SourceUnavailableError>> {
  const sample = new SampleTextSource(config.extraction.sampleFile);

  let source: TextSource;
  if (options.text !== undefined) {
    source = new StringTextSource(options.text);
  } else if (options.file !== undefined) {
    source = new FileTextSource(options.file);
  } else if (options.sample || !io.isInteractive) {
    source = sample;
  } else {
    const prompt = new PromptTextSource(io.stdin, io.stdout);
    const answer = await prompt.read();
    if (answer.ok && answer.value.length > 0) {
      return ok({ id: prompt.id, text: answer.value });
    }
    if (!answer.ok) {
      loggers.cli().warn('Prompt gave no text, using sample data', { reason: answer.error.message });
    }
    source = sample;
  }

  const text = await source.read();
  if (!text.ok) {
    return err(text.error);
  }
  return ok({ id: source.id, text: text.value });
}

function writeLine(stream: Writable, line: string): void {
  stream.write(`${line}\n`);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENTRY
// ─────────────────────────────────────────────────────────────────────────────────

export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const { io } = deps;

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    writeLine(io.stderr, `Error: ${parsed.error.message}`);
    writeLine(io.stderr, '');
    writeLine(io.stderr, USAGE);
    return EXIT_USAGE;
  }

  const options = parsed.value;
  if (options.help) {
    writeLine(io.stdout, USAGE);
    return EXIT_OK;
  }

  let config: ExtractorConfig;
  let registry: PatternRegistry;
  try {
    config = deps.config ?? loadConfig();
    configureLogger(config.logging);
    registry = await buildRegistry(options, config);
  } catch (error) {
    if (
      error instanceof ConfigError ||
      error instanceof PatternCompileError ||
      error instanceof SourceUnavailableError
    ) {
      writeLine(io.stderr, `Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = loggers.cli();
  const input = await readText(options, config, io);
  if (!input.ok) {
    writeLine(io.stderr, `Error: ${input.error.message}`);
    return EXIT_FAILURE;
  }

  const startTime = Date.now();
  const record = aggregate(input.value.id, extract(input.value.text, registry));
  logger.time('Extraction finished', startTime, {
    source: record.source,
    totalMatches: record.totalMatches,
  });

  const report = getFormatter(options.format).format(record, { prettyPrint: config.output.prettyJson });
  writeLine(io.stdout, report);

  if (!options.save) {
    return EXIT_OK;
  }

  const sink = new JsonFileSink({
    directory: options.outDir ?? config.output.directory,
    prettyPrint: config.output.prettyJson,
  });
  const written = await sink.write(record);
  if (!written.ok) {
    writeLine(io.stderr, `Error: ${written.error.message}`);
    return EXIT_FAILURE;
  }

  writeLine(io.stderr, `Results saved to ${written.value}`);
  return EXIT_OK;
}
