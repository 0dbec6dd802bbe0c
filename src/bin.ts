#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════════════════════
// token-extract — Command Line Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import { runCli } from './cli/index.js';

void runCli(process.argv.slice(2), {
  io: {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    isInteractive: Boolean(process.stdin.isTTY),
  },
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    // Written directly: the logger may be what failed
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
    process.stderr.write(`Unexpected failure: ${detail}\n`);
    process.exitCode = 1;
  }
);
