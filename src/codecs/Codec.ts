import type { Endian } from '../Endian';
import { ContextCloneError, guardParse } from '../errors';
import { streamPosition } from '../stream/position';
import { SeekFrom, type ByteWriter, type ReadSeeker } from '../stream/types';

/**
 * Decodes a `T` from a stream, given a context value (usually the byte order).
 * @template T The TypeScript type produced.
 * @template D The context threaded through the parse.
 */
export interface Parser<T, D = Endian> {
  /** Decode a value at the stream's current position. Throws ParseError. */
  parse(stream: ReadSeeker, ctx: D): T;
}

/**
 * Encodes a `T`, emitting exactly the bytes the matching parser consumes.
 */
export interface Writer<T, D = Endian> {
  /** Encode a value at the stream's current position. Throws WriteError. */
  writeTo(stream: ByteWriter, value: T, ctx: D): void;
}

/** Reports how many bytes a value occupies once written. */
export interface Sized<T, D = Endian> {
  byteSize(value: T, ctx: D): number;
}

/** Base interface for every codec in this toolkit. */
export interface Codec<T, D = Endian> extends Parser<T, D>, Writer<T, D>, Sized<T, D> {}

/** Produces an independent copy of a context for each element of a container. */
export type ContextCloner<D> = (ctx: D) => D;

/**
 * Default context cloner: primitives are returned as-is, objects are
 * deep-copied with `structuredClone`. Pass a custom cloner for contexts
 * holding functions or class instances; those throw ContextCloneError.
 */
export function cloneContext<D>(ctx: D): D {
  if (typeof ctx === 'object' && ctx !== null) {
    try {
      return structuredClone(ctx);
    } catch (err) {
      throw new ContextCloneError({ cause: err });
    }
  }
  return ctx;
}

/**
 * Parse a value, then seek back to where the stream was before the call,
 * whether or not the parse succeeded. If the restoring seek itself fails,
 * its error is thrown and the stream position is undefined.
 */
export function parsePeek<T, D>(parser: Parser<T, D>, stream: ReadSeeker, ctx: D): T {
  const initial = guardParse(() => streamPosition(stream));
  try {
    return parser.parse(stream, ctx);
  } finally {
    guardParse(() => stream.seek(SeekFrom.start(initial)));
  }
}
