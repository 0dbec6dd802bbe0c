// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS — Failure Types Shared by Registry, Sources, Sink and CLI
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A registry entry could not be compiled or validated.
 * Raised while the registry is built, never during extraction.
 */
export class PatternCompileError extends Error {
  readonly name = 'PatternCompileError';
  readonly category?: string;
  readonly pattern?: string;

  constructor(message: string, options: { category?: string; pattern?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.category = options.category;
    this.pattern = options.pattern;
  }
}

/**
 * A text source could not supply text (missing file, closed prompt).
 */
export class SourceUnavailableError extends Error {
  readonly name = 'SourceUnavailableError';
  readonly sourceId: string;

  constructor(sourceId: string, reason: string, cause?: unknown) {
    super(`Source unavailable: ${sourceId} (${reason})`, { cause });
    this.sourceId = sourceId;
  }
}

/**
 * The sink could not persist a result. The record itself is still valid.
 */
export class SinkWriteError extends Error {
  readonly name = 'SinkWriteError';
  readonly destination: string;

  constructor(destination: string, reason: string, cause?: unknown) {
    super(`Could not write ${destination}: ${reason}`, { cause });
    this.destination = destination;
  }
}

export class CliUsageError extends Error {
  readonly name = 'CliUsageError';
}
