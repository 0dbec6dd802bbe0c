// ═══════════════════════════════════════════════════════════════════════════════
// CLI ARGUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

import { REPORT_FORMATS, type ReportFormat } from '../export/types.js';
import { CliUsageError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export interface CliOptions {
  file?: string;
  text?: string;
  sample: boolean;
  categories?: string[];
  patternsFile?: string;
  outDir?: string;
  format: ReportFormat;
  save: boolean;
  help: boolean;
}

export const USAGE = `Usage: token-extract [file] [options]

Extracts emails, URLs, phone numbers, card numbers, times, hashtags and
currency values from text and writes results_<name>.json.

Without a file, --text or --sample, text is read from an interactive prompt;
an empty answer (or a non-interactive stdin) uses the sample data.

Options:
  --text <text>          Extract from the given text
  --sample               Write and use the sample data file
  --categories <list>    Comma-separated categories to extract
  --patterns <file>      JSON file with custom patterns
  --out-dir <dir>        Directory for the results file
  --format <format>      Report format: ${REPORT_FORMATS.join(', ')} (default: text)
  --json                 Same as --format json
  --no-save              Print the report without writing the results file
  -h, --help             Show this help`;

const VALUE_FLAGS = new Set(['--text', '--categories', '--patterns', '--out-dir', '--format']);

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

export function parseArgs(argv: readonly string[]): Result<CliOptions, CliUsageError> {
  const options: CliOptions = {
    sample: false,
    format: 'text',
    save: true,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // --flag=value
    let flag = arg;
    let inlineValue: string | undefined;
    if (arg.startsWith('--') && arg.includes('=')) {
      const eq = arg.indexOf('=');
      flag = arg.slice(0, eq);
      inlineValue = arg.slice(eq + 1);
    }

    if (VALUE_FLAGS.has(flag)) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined) {
        return err(new CliUsageError(`${flag} requires a value`));
      }

      switch (flag) {
        case '--text':
          options.text = value;
          break;
        case '--categories':
          options.categories = splitList(value);
          break;
        case '--patterns':
          options.patternsFile = value;
          break;
        case '--out-dir':
          options.outDir = value;
          break;
        case '--format':
          if (!isReportFormat(value)) {
            return err(new CliUsageError(`Unknown format "${value}" (expected ${REPORT_FORMATS.join(', ')})`));
          }
          options.format = value;
          break;
      }
      continue;
    }

    if (inlineValue !== undefined) {
      return err(new CliUsageError(`${flag} does not take a value`));
    }

    if (arg === '--sample') {
      options.sample = true;
    } else if (arg === '--json') {
      options.format = 'json';
    } else if (arg === '--no-save') {
      options.save = false;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg.startsWith('-')) {
      return err(new CliUsageError(`Unknown option ${arg}`));
    } else if (options.file === undefined) {
      options.file = arg;
    } else {
      return err(new CliUsageError(`Unexpected argument ${arg}`));
    }
  }

  const chosen = [options.file !== undefined, options.text !== undefined, options.sample].filter(Boolean);
  if (chosen.length > 1) {
    return err(new CliUsageError('Use only one of a file argument, --text or --sample'));
  }

  return ok(options);
}
