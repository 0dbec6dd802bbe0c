// ═══════════════════════════════════════════════════════════════════════════════
// CLI MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export { parseArgs, USAGE, type CliOptions } from './args.js';
export {
  runCli,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_USAGE,
  type CliIO,
  type CliDependencies,
} from './run.js';
