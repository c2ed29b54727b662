import { take } from '../../src/combinators';
import { ParseError, StreamError } from '../../src/errors';
import { BoundedStream } from '../../src/stream/BoundedStream';
import { ByteCursor } from '../../src/stream/ByteCursor';
import { readBestEffort, readExact } from '../../src/stream/io';
import { MAX_OFFSET } from '../../src/stream/position';
import { SeekFrom } from '../../src/stream/types';
import { TrackingStream, thrown } from '../helpers/streams';

/** Bytes whose value equals their offset. */
function ramp(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

function readN(stream: BoundedStream<ByteCursor>, count: number): number[] {
  const buf = new Uint8Array(count);
  readExact(stream, buf);
  return Array.from(buf);
}

describe('BoundedStream', () => {
  describe('reading a whole buffer in chunks', () => {
    it('reads, fails at the end, and recovers after a seek', () => {
      const input = ramp(17);
      const slice = BoundedStream.create(ByteCursor.from(input), { start: 0, end: input.length });
      expect(slice.position()).toBe(0);
      expect(slice.length()).toBe(17);

      expect(readN(slice, 4)).toEqual([0, 1, 2, 3]);
      expect(slice.position()).toBe(4);
      expect(readN(slice, 4)).toEqual([4, 5, 6, 7]);
      expect(slice.position()).toBe(8);
      expect(readN(slice, 4)).toEqual([8, 9, 0xa, 0xb]);
      expect(slice.position()).toBe(12);
      expect(readN(slice, 4)).toEqual([0xc, 0xd, 0xe, 0xf]);
      expect(slice.position()).toBe(16);

      const err = thrown(() => take(slice, 4));
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ kind: 'unexpected-eof' });

      expect(slice.seek(SeekFrom.start(13))).toBe(13);
      expect(slice.position()).toBe(13);
      expect(readN(slice, 4)).toEqual([0xd, 0xe, 0xf, 0x10]);
      expect(slice.position()).toBe(17);
    });

    it('works over a window that starts inside the stream', () => {
      const cursor = ByteCursor.from(ramp(17));
      expect(cursor.seek(SeekFrom.start(3))).toBe(3);
      const slice = BoundedStream.create(cursor, { start: 3, end: 17 });
      expect(slice.position()).toBe(0);
      expect(slice.absolutePosition()).toBe(3);
      expect(slice.length()).toBe(14);

      expect(readN(slice, 5)).toEqual([3, 4, 5, 6, 7]);
      expect(slice.position()).toBe(5);
      expect(readN(slice, 5)).toEqual([8, 9, 0xa, 0xb, 0xc]);
      expect(slice.position()).toBe(10);
      expect(() => readN(slice, 5)).toThrow(StreamError);

      expect(slice.seek(SeekFrom.start(10))).toBe(10);
      expect(readN(slice, 4)).toEqual([0xd, 0xe, 0xf, 0x10]);
      expect(slice.position()).toBe(14);
      expect(slice.length()).toBe(14);
    });
  });

  describe('construction', () => {
    it('rejects a stream positioned outside the range without moving it', () => {
      const cursor = ByteCursor.from(ramp(12));
      cursor.seek(SeekFrom.start(3));
      const err = thrown(() => BoundedStream.create(cursor, { start: 5, end: 10 }));
      expect(err).toBeInstanceOf(StreamError);
      expect(err).toMatchObject({ code: 'invalid-input' });
      expect(cursor.position).toBe(3);
    });

    it('accepts a stream positioned exactly at the end of the range', () => {
      const cursor = ByteCursor.from(ramp(12));
      cursor.seek(SeekFrom.start(10));
      const slice = BoundedStream.create(cursor, { start: 5, end: 10 });
      expect(slice.atEnd()).toBe(true);
      expect(slice.position()).toBe(5);
    });

    it('skips the position check when unchecked', () => {
      const slice = BoundedStream.unchecked(ByteCursor.from(ramp(12)), { start: 5, end: 10 });
      expect(slice.start).toBe(5);
      expect(thrown(() => slice.position())).toMatchObject({ code: 'invalid-input' });
      expect(thrown(() => slice.read(new Uint8Array(1)))).toMatchObject({ code: 'invalid-input' });
    });

    it('accepts an inclusive last bound', () => {
      const slice = BoundedStream.unchecked(ByteCursor.alloc(), { start: 2, last: 4 });
      expect(slice.start).toBe(2);
      expect(slice.last).toBe(4);
      expect(slice.end).toBe(5);
      expect(slice.size).toBe(3);
    });

    it('defaults to an unbounded range', () => {
      const slice = BoundedStream.create(ByteCursor.from([1, 2]), {});
      expect(slice.start).toBe(0);
      expect(slice.end).toBe(MAX_OFFSET);
      expect(slice.length()).toBe(2);
    });

    it('saturates an inclusive last at MAX_OFFSET', () => {
      const slice = BoundedStream.unchecked(ByteCursor.alloc(), { last: MAX_OFFSET });
      expect(slice.end).toBe(MAX_OFFSET);
    });

    it('rejects malformed ranges', () => {
      const cursor = ByteCursor.alloc();
      expect(() => BoundedStream.unchecked(cursor, { start: 5, end: 3 })).toThrow(StreamError);
      expect(() => BoundedStream.unchecked(cursor, { end: 3, last: 2 })).toThrow(StreamError);
      expect(() => BoundedStream.unchecked(cursor, { start: -1 })).toThrow(StreamError);
      expect(() => BoundedStream.unchecked(cursor, { end: 1.5 })).toThrow(StreamError);
    });

    it('at() spans the next bytes from the current position', () => {
      const cursor = ByteCursor.from(ramp(10));
      cursor.seek(SeekFrom.start(4));
      const slice = BoundedStream.at(cursor, 3);
      expect(slice.start).toBe(4);
      expect(slice.end).toBe(7);
      const buf = new Uint8Array(10);
      expect(readBestEffort(slice, buf)).toBe(3);
      expect(Array.from(buf.subarray(0, 3))).toEqual([4, 5, 6]);
    });

    it('at() saturates instead of overflowing', () => {
      const cursor = ByteCursor.from(ramp(10));
      cursor.seek(SeekFrom.start(10));
      const slice = BoundedStream.at(cursor, MAX_OFFSET);
      expect(slice.start).toBe(10);
      expect(slice.end).toBe(MAX_OFFSET);
      expect(slice.length()).toBe(0);
    });
  });

  describe('bounds and queries', () => {
    it('answers contains and distanceToEnd', () => {
      const slice = BoundedStream.unchecked(ByteCursor.alloc(), { start: 2, end: 6 });
      expect(slice.last).toBe(5);
      expect(slice.contains(1)).toBe(false);
      expect(slice.contains(2)).toBe(true);
      expect(slice.contains(5)).toBe(true);
      expect(slice.contains(6)).toBe(false);
      expect(slice.distanceToEnd(4)).toBe(2);
      expect(slice.distanceToEnd(9)).toBe(0);
    });

    it('clamps length to the window size', () => {
      const slice = BoundedStream.create(ByteCursor.from(ramp(17)), { start: 0, end: 5 });
      expect(slice.length()).toBe(5);
    });

    it('clamps length to what the stream holds', () => {
      const cursor = ByteCursor.from(ramp(10));
      cursor.seek(SeekFrom.start(4));
      const slice = BoundedStream.create(cursor, { start: 4, end: 100 });
      expect(slice.length()).toBe(6);
    });

    it('measures length without moving the stream and with at most two moves', () => {
      const stream = new TrackingStream(ramp(10));
      stream.seek(SeekFrom.start(2));
      const slice = BoundedStream.at(stream, 5);
      slice.seek(SeekFrom.start(1));
      stream.seeks.length = 0;

      expect(slice.length()).toBe(5);
      expect(stream.movingSeeks).toHaveLength(2);
      expect(slice.position()).toBe(1);
    });

    it('treats a zero-length window as exhausted', () => {
      const cursor = ByteCursor.from([1, 2, 3]);
      cursor.seek(SeekFrom.start(1));
      const slice = BoundedStream.at(cursor, 0);
      expect(slice.atEnd()).toBe(true);
      expect(slice.length()).toBe(0);
      expect(slice.read(new Uint8Array(4))).toBe(0);
      expect(slice.position()).toBe(0);
    });
  });

  describe('read', () => {
    it('returns 0 for an empty buffer without touching the stream', () => {
      const stream = new TrackingStream(ramp(4));
      const slice = BoundedStream.at(stream, 4);
      stream.seeks.length = 0;
      expect(slice.read(new Uint8Array(0))).toBe(0);
      expect(stream.seeks).toHaveLength(0);
    });

    it('never reads outside the window', () => {
      const stream = new TrackingStream(ramp(20));
      stream.seek(SeekFrom.start(5));
      const slice = BoundedStream.at(stream, 6);
      const buf = new Uint8Array(20);
      expect(readBestEffort(slice, buf)).toBe(6);
      expect(Array.from(buf.subarray(0, 6))).toEqual([5, 6, 7, 8, 9, 10]);
      expect(stream.touched).toEqual([5, 6, 7, 8, 9, 10]);
    });

    it('nests inside another view', () => {
      const cursor = ByteCursor.from(ramp(20));
      cursor.seek(SeekFrom.start(2));
      const outer = BoundedStream.at(cursor, 10);
      outer.seek(SeekFrom.start(3));
      const inner = BoundedStream.at(outer, 4);
      expect(inner.start).toBe(3);

      const buf = new Uint8Array(10);
      expect(readBestEffort(inner, buf)).toBe(4);
      expect(Array.from(buf.subarray(0, 4))).toEqual([5, 6, 7, 8]);
      expect(outer.position()).toBe(7);
    });
  });

  describe('seek', () => {
    const window = () => {
      const cursor = ByteCursor.from(ramp(10));
      cursor.seek(SeekFrom.start(2));
      return BoundedStream.create(cursor, { start: 2, end: 6 });
    };

    it('clamps seeks past the end and then reads nothing', () => {
      const slice = window();
      expect(slice.seek(SeekFrom.start(100))).toBe(4);
      expect(slice.atEnd()).toBe(true);
      expect(slice.absolutePosition()).toBe(6);
      expect(slice.read(new Uint8Array(2))).toBe(0);
    });

    it('seeks relative to the window end', () => {
      const slice = window();
      expect(slice.seek(SeekFrom.end(0))).toBe(4);
      expect(slice.seek(SeekFrom.end(-1))).toBe(3);
      expect(readN(slice, 1)).toEqual([5]);
      expect(slice.seek(SeekFrom.end(3))).toBe(4);
    });

    it('seeks relative to the current position', () => {
      const slice = window();
      expect(slice.seek(SeekFrom.current(1))).toBe(1);
      expect(slice.seek(SeekFrom.current(2))).toBe(3);
      expect(slice.seek(SeekFrom.current(-3))).toBe(0);
    });

    it('rejects seeks before the window start', () => {
      const slice = window();
      slice.seek(SeekFrom.start(2));
      expect(thrown(() => slice.seek(SeekFrom.current(-3)))).toMatchObject({ code: 'invalid-input' });
      expect(thrown(() => slice.seek(SeekFrom.start(-1)))).toMatchObject({ code: 'invalid-input' });
      expect(thrown(() => slice.seek(SeekFrom.end(-5)))).toMatchObject({ code: 'invalid-input' });
      expect(slice.position()).toBe(2);
    });

    it('rejects seeks that overflow once the start is added', () => {
      const slice = window();
      const err = thrown(() => slice.seek(SeekFrom.start(MAX_OFFSET)));
      expect(err).toBeInstanceOf(StreamError);
      expect(err).toMatchObject({ code: 'invalid-input' });
    });

    it('repositions the wrapped stream with absolute seeks only', () => {
      const stream = new TrackingStream(ramp(10));
      stream.seek(SeekFrom.start(2));
      const slice = BoundedStream.at(stream, 4);
      stream.seeks.length = 0;

      slice.seek(SeekFrom.current(2));
      slice.seek(SeekFrom.end(-1));
      expect(stream.movingSeeks).toEqual([SeekFrom.start(4), SeekFrom.start(5)]);
    });
  });

  describe('ownership', () => {
    it('hands back the stream at its last position', () => {
      const cursor = ByteCursor.from(ramp(10));
      const slice = BoundedStream.at(cursor, 5);
      readN(slice, 3);
      const released = slice.intoInner();
      expect(released).toBe(cursor);
      expect(released.position).toBe(3);
    });

    it('refuses every operation once released', () => {
      const slice = BoundedStream.at(ByteCursor.from(ramp(4)), 4);
      slice.intoInner();
      expect(thrown(() => slice.position())).toMatchObject({ code: 'released' });
      expect(thrown(() => slice.read(new Uint8Array(1)))).toMatchObject({ code: 'released' });
      expect(thrown(() => slice.seek(SeekFrom.start(0)))).toMatchObject({ code: 'released' });
      expect(thrown(() => slice.intoInner())).toMatchObject({ code: 'released' });
    });

    it('exposes the wrapped stream directly', () => {
      const cursor = ByteCursor.from(ramp(4));
      const slice = BoundedStream.at(cursor, 4);
      expect(slice.inner).toBe(cursor);
    });
  });
});
