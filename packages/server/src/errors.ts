// ============================================================================
// flexwatch: Error taxonomy
// ============================================================================

export type ParseErrorReason = 'empty' | 'unrecognized' | 'malformed' | 'no-capcode';

export class FlexwatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Capcode file or decoder stream could not be opened. Fatal at startup. */
export class LoadError extends FlexwatchError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('LOAD_FAILED', message, options);
    this.path = path;
  }
}

/** A single decoder line was rejected. Recovered by dropping the line. */
export class ParseError extends FlexwatchError {
  readonly reason: ParseErrorReason;
  readonly line: string;

  constructor(reason: ParseErrorReason, line: string, detail?: string) {
    super('PARSE_FAILED', detail ? `${reason}: ${detail}` : reason);
    this.reason = reason;
    this.line = line;
  }
}

/** A durability flush failed. The in-memory store stays authoritative. */
export class StoreIOError extends FlexwatchError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('STORE_IO', message, options);
    this.path = path;
  }
}

/** The decoder stream ended or failed after startup. Fatal to the process. */
export class IngestionLostError extends FlexwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INGESTION_LOST', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
