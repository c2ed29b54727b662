import { StreamError } from '../errors';
import {
  MAX_OFFSET,
  checkedAdd,
  checkedSub,
  isOffset,
  saturatingAdd,
  streamLength,
  streamPosition,
} from './position';
import { SeekFrom, type ByteReader, type ReadSeeker, type Seekable } from './types';

/**
 * Absolute byte range within an underlying stream. Give either an exclusive
 * `end` or an inclusive `last`; omit both for an unbounded range.
 */
export interface ByteRange {
  /** First byte (inclusive). Defaults to 0. */
  start?: number;
  /** One past the last byte. */
  end?: number;
  /** Last byte (inclusive). */
  last?: number;
}

function normalizeRange(range: ByteRange): { start: number; end: number } {
  const start = range.start ?? 0;
  if (range.end !== undefined && range.last !== undefined) {
    throw new StreamError('invalid-input', 'ByteRange: give either end or last, not both');
  }
  let end: number;
  if (range.end !== undefined) {
    end = range.end;
  } else if (range.last !== undefined) {
    end = isOffset(range.last) ? saturatingAdd(range.last, 1) : range.last;
  } else {
    end = MAX_OFFSET;
  }
  if (!isOffset(start) || !isOffset(end)) {
    throw new StreamError('invalid-input', `ByteRange: bounds must be non-negative safe integers, got [${start}, ${end})`);
  }
  if (end < start) {
    throw new StreamError('invalid-input', `ByteRange: end ${end} is before start ${start}`);
  }
  return { start, end };
}

/**
 * A window over an owned seekable stream.
 *
 * Reads and seeks behave as if the stream began at `start` and ended at
 * `end`: positions are reported relative to `start`, reads never cross
 * `end`, and seeks past `end` pin to it. Bytes outside the window are never
 * read. The wrapped stream is handed back with {@link intoInner}, after
 * which the view refuses every operation.
 */
export class BoundedStream<F extends ReadSeeker> implements ByteReader, Seekable {
  private _inner: F | undefined;
  private readonly _start: number;
  private readonly _end: number;

  private constructor(inner: F, start: number, end: number) {
    this._inner = inner;
    this._start = start;
    this._end = end;
  }

  /**
   * Create a view over `range`. The stream's current position must lie in
   * `[start, end]`. Does not move the stream.
   */
  static create<F extends ReadSeeker>(inner: F, range: ByteRange): BoundedStream<F> {
    const { start, end } = normalizeRange(range);
    const position = streamPosition(inner);
    if (position < start || position > end) {
      throw new StreamError(
        'invalid-input',
        `BoundedStream: position ${position} is outside range [${start}, ${end})`,
      );
    }
    return new BoundedStream(inner, start, end);
  }

  /**
   * Create a view without checking the stream's position.
   * The caller guarantees `start <= position <= end`.
   */
  static unchecked<F extends ReadSeeker>(inner: F, range: ByteRange): BoundedStream<F> {
    const { start, end } = normalizeRange(range);
    return new BoundedStream(inner, start, end);
  }

  /**
   * View of the next `length` bytes from the current position. The end
   * saturates at MAX_OFFSET instead of overflowing.
   */
  static at<F extends ReadSeeker>(inner: F, length: number): BoundedStream<F> {
    if (!isOffset(length)) {
      throw new StreamError('invalid-input', `BoundedStream: invalid length ${length}`);
    }
    const start = streamPosition(inner);
    return new BoundedStream(inner, start, saturatingAdd(start, length));
  }

  /** First absolute offset of the window. */
  get start(): number {
    return this._start;
  }

  /** Last absolute offset of the window (inclusive); `start - 1` when empty. */
  get last(): number {
    return this._end - 1;
  }

  /** One past the last absolute offset of the window. */
  get end(): number {
    return this._end;
  }

  /** Window size in bytes. */
  get size(): number {
    return this._end - this._start;
  }

  contains(absolute: number): boolean {
    return absolute >= this._start && absolute < this._end;
  }

  /**
   * The wrapped stream. Moving it directly can leave it outside the window;
   * subsequent view operations then fail or clamp.
   */
  get inner(): F {
    return this.owned();
  }

  /** Release the wrapped stream at whatever position it was left. */
  intoInner(): F {
    const inner = this.owned();
    this._inner = undefined;
    return inner;
  }

  /** Position relative to `start`. */
  position(): number {
    const absolute = this.absolutePosition();
    const relative = checkedSub(absolute, this._start);
    if (relative === undefined) {
      throw new StreamError(
        'invalid-input',
        `BoundedStream: underlying position ${absolute} is before window start ${this._start}`,
      );
    }
    return relative;
  }

  /** Position in the wrapped stream, queried on the wrapped stream itself. */
  absolutePosition(): number {
    return streamPosition(this.owned());
  }

  /**
   * Number of bytes reachable through the view: the wrapped stream's length
   * past `start`, never more than the window size.
   */
  length(): number {
    const physical = streamLength(this.owned());
    return Math.min(Math.max(physical - this._start, 0), this.size);
  }

  distanceToEnd(absolute: number): number {
    return Math.max(this._end - absolute, 0);
  }

  atEnd(): boolean {
    return this.absolutePosition() === this._end;
  }

  read(buffer: Uint8Array): number {
    if (buffer.length === 0) return 0;
    const inner = this.owned();
    const absolute = streamPosition(inner);
    if (absolute < this._start) {
      throw new StreamError(
        'invalid-input',
        `BoundedStream: underlying position ${absolute} is before window start ${this._start}`,
      );
    }
    if (absolute >= this._end) return 0;

    const max = Math.min(buffer.length, this.distanceToEnd(absolute));
    const count = inner.read(buffer.subarray(0, max));
    if (absolute + count > this._end) {
      throw new StreamError('other', `BoundedStream: read of ${count} bytes crossed window end ${this._end}`);
    }
    return count;
  }

  /** Seek within the window. Returns the new position relative to `start`. */
  seek(pos: SeekFrom): number {
    const inner = this.owned();
    let base: number;
    switch (pos.whence) {
      case 'start':
        base = 0;
        break;
      case 'current':
        base = this.position();
        break;
      case 'end':
        base = this.size;
        break;
    }

    const relative = Number.isSafeInteger(pos.offset) ? checkedAdd(base, pos.offset) : undefined;
    if (relative === undefined) {
      throw new StreamError(
        'invalid-input',
        `BoundedStream: invalid seek to a negative or overflowing position (${pos.whence} ${pos.offset})`,
      );
    }
    const target = checkedAdd(relative, this._start);
    if (target === undefined) {
      throw new StreamError(
        'invalid-input',
        `BoundedStream: seek to ${relative} overflows when added to window start ${this._start}`,
      );
    }

    const clamped = target <= this._end ? target : this._end;
    const landed = inner.seek(SeekFrom.start(clamped));
    const result = checkedSub(landed, this._start);
    if (result === undefined) {
      throw new StreamError('other', `BoundedStream: wrapped stream landed at ${landed}, before window start ${this._start}`);
    }
    return result;
  }

  private owned(): F {
    if (this._inner === undefined) {
      throw new StreamError('released', 'BoundedStream: the wrapped stream was already released');
    }
    return this._inner;
  }
}
