import { cloneContext, type ContextCloner, type Parser } from './codecs/Codec';
import { ParseError, guardParse } from './errors';
import { readExact } from './stream/io';
import { streamLength, streamPosition } from './stream/position';
import type { ByteReader, ReadSeeker } from './stream/types';

/** Read one byte. */
export function single(stream: ByteReader): number {
  const out = new Uint8Array(1);
  guardParse(() => readExact(stream, out));
  return out[0];
}

/** Read exactly `count` bytes. */
export function take(stream: ByteReader, count: number): Uint8Array {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new ParseError('invalid-argument', `take: invalid byte count ${count}`);
  }
  const out = new Uint8Array(count);
  guardParse(() => readExact(stream, out));
  return out;
}

/**
 * Read bytes up to a terminator. The terminator is always consumed; it is
 * part of the result only when `includeTerminator` is set.
 */
export function takeUntil(stream: ByteReader, terminator: number, includeTerminator: boolean): Uint8Array {
  const result: number[] = [];
  for (;;) {
    const value = single(stream);
    if (value === terminator) {
      if (includeTerminator) result.push(value);
      break;
    }
    result.push(value);
  }
  return Uint8Array.from(result);
}

/**
 * Expect a fixed byte sequence. All `expected.length` bytes are consumed
 * before comparing; the first mismatch is reported.
 */
export function tag(stream: ByteReader, expected: Uint8Array | readonly number[]): void {
  const found = take(stream, expected.length);
  for (let i = 0; i < expected.length; i++) {
    if (found[i] !== expected[i]) {
      throw new ParseError(
        'invalid-byte',
        `tag: byte ${i} is 0x${hex(found[i])}, expected 0x${hex(expected[i])}`,
        { index: i, expected: expected[i], found: found[i] },
      );
    }
  }
}

/** Fail unless the stream is positioned at its end. */
export function expectEnd(stream: ReadSeeker): void {
  const { position, length } = guardParse(() => ({
    position: streamPosition(stream),
    length: streamLength(stream),
  }));
  if (position < length) {
    throw new ParseError('expected-eof', `Expected end of stream, ${length - position} bytes remain`);
  }
}

/**
 * Call `step` until the stream is exhausted, collecting the results.
 *
 * The length is measured once, before the first step. Each step gets its
 * own copy of `ctx`. Nothing is rolled back on error, so use this only over
 * data that `step` decomposes exactly.
 */
export function many<R, D>(
  stream: ReadSeeker,
  ctx: D,
  step: (stream: ReadSeeker, ctx: D) => R,
  cloner: ContextCloner<D> = cloneContext,
): R[] {
  const result: R[] = [];
  const length = guardParse(() => streamLength(stream));
  let position = guardParse(() => streamPosition(stream));

  while (position < length) {
    const value = guardParse(() => step(stream, cloner(ctx)));
    result.push(value);

    const next = guardParse(() => streamPosition(stream));
    if (next === position) {
      throw new ParseError('stalled', `many: step consumed no bytes at offset ${position}`);
    }
    position = next;
  }

  if (position !== length) {
    throw new ParseError('overrun', `many: step ended at offset ${position}, past stream length ${length}`);
  }
  return result;
}

/** {@link many} over a parser. */
export function manyParse<T, D>(
  stream: ReadSeeker,
  parser: Parser<T, D>,
  ctx: D,
  cloner: ContextCloner<D> = cloneContext,
): T[] {
  return many(stream, ctx, (s, c) => parser.parse(s, c), cloner);
}

function hex(value: number): string {
  return value.toString(16).padStart(2, '0');
}
