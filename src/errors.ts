/**
 * Error taxonomy shared by streams, parsers and writers.
 *
 * Streams raise {@link StreamError}. Parsers and writers raise
 * {@link ParseError} / {@link WriteError}, wrapping whatever the stream
 * raised so callers only need to branch on `kind`.
 */

export type StreamErrorCode =
  | 'invalid-input'
  | 'unexpected-eof'
  | 'interrupted'
  | 'write-zero'
  | 'released'
  | 'other';

/** Failure of a stream's read, write or seek primitive. */
export class StreamError extends Error {
  readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
    this.code = code;
  }
}

/** A decoded integer had no matching member in a closed value set. */
export class EnumConversionError extends Error {
  readonly value: number | bigint;

  constructor(value: number | bigint, typeName?: string) {
    super(
      typeName
        ? `Invalid ${typeName} value: ${value}`
        : `Invalid enumeration value: ${value}`,
    );
    this.name = 'EnumConversionError';
    this.value = value;
  }
}

/** The default context cloner could not copy a context value. */
export class ContextCloneError extends Error {
  constructor(options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Context cannot be copied with structuredClone (${reason}); pass a custom ContextCloner`, options);
    this.name = 'ContextCloneError';
  }
}

export type ParseErrorKind =
  | 'io'
  | 'unexpected-eof'
  | 'invalid-byte'
  | 'invalid-enum'
  | 'invalid-argument'
  | 'expected-eof'
  | 'overrun'
  | 'stalled'
  | 'custom';

export interface ParseErrorOptions {
  cause?: unknown;
  /** Index of the offending byte within the compared sequence. */
  index?: number;
  expected?: number;
  found?: number;
}

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly index?: number;
  readonly expected?: number;
  readonly found?: number;

  constructor(kind: ParseErrorKind, message: string, options: ParseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ParseError';
    this.kind = kind;
    this.index = options.index;
    this.expected = options.expected;
    this.found = options.found;
  }

  /** Map any thrown value onto the parse error taxonomy. */
  static wrap(err: unknown): ParseError {
    if (err instanceof ParseError) return err;
    if (err instanceof StreamError) {
      switch (err.code) {
        case 'unexpected-eof':
          return new ParseError('unexpected-eof', err.message, { cause: err });
        case 'invalid-input':
          return new ParseError('invalid-argument', err.message, { cause: err });
        default:
          return new ParseError('io', err.message, { cause: err });
      }
    }
    if (err instanceof EnumConversionError) {
      return new ParseError('invalid-enum', err.message, { cause: err });
    }
    if (err instanceof ContextCloneError) {
      return new ParseError('invalid-argument', err.message, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new ParseError('custom', message, { cause: err });
  }
}

export type WriteErrorKind = 'io' | 'invalid-value';

export class WriteError extends Error {
  readonly kind: WriteErrorKind;

  constructor(kind: WriteErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WriteError';
    this.kind = kind;
  }

  static wrap(err: unknown): WriteError {
    if (err instanceof WriteError) return err;
    if (err instanceof ContextCloneError) {
      return new WriteError('invalid-value', err.message, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new WriteError('io', message, { cause: err });
  }
}

/** Run `fn`, rethrowing any failure as a {@link ParseError}. */
export function guardParse<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw ParseError.wrap(err);
  }
}

/** Run `fn`, rethrowing any failure as a {@link WriteError}. */
export function guardWrite<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw WriteError.wrap(err);
  }
}
