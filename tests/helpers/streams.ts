import { StreamError } from '../../src/errors';
import { ByteCursor } from '../../src/stream/ByteCursor';
import type { ByteReader, ByteWriter, ReadSeeker, SeekFrom } from '../../src/stream/types';

/**
 * Cursor wrapper that records every seek and every byte range read,
 * for asserting what a wrapper did to the stream underneath it.
 */
export class TrackingStream implements ReadSeeker {
  readonly cursor: ByteCursor;
  readonly seeks: SeekFrom[] = [];
  /** Absolute offsets handed out by read(), in order. */
  readonly touched: number[] = [];

  constructor(data: Uint8Array | readonly number[]) {
    this.cursor = ByteCursor.from(data);
  }

  read(buffer: Uint8Array): number {
    const from = this.cursor.position;
    const count = this.cursor.read(buffer);
    for (let i = 0; i < count; i++) this.touched.push(from + i);
    return count;
  }

  seek(pos: SeekFrom): number {
    this.seeks.push(pos);
    return this.cursor.seek(pos);
  }

  /** Seeks that moved the cursor, i.e. everything but position queries. */
  get movingSeeks(): SeekFrom[] {
    return this.seeks.filter(s => !(s.whence === 'current' && s.offset === 0));
  }
}

/** Reader that hands out at most `chunk` bytes per call and fails `interrupted` every other call. */
export class InterruptingReader implements ByteReader {
  private calls = 0;
  interruptions = 0;

  constructor(private readonly source: ByteReader, private readonly chunk = 2) {}

  read(buffer: Uint8Array): number {
    this.calls++;
    if (this.calls % 2 === 1) {
      this.interruptions++;
      throw new StreamError('interrupted', 'interrupted');
    }
    return this.source.read(buffer.subarray(0, Math.min(buffer.length, this.chunk)));
  }
}

/** Reader whose every call fails with the given error. */
export class FailingStream implements ReadSeeker, ByteWriter {
  constructor(private readonly error: Error) {}

  read(): number {
    throw this.error;
  }

  write(): number {
    throw this.error;
  }

  seek(): number {
    throw this.error;
  }
}

/** Writer that accepts nothing. */
export class FullWriter implements ByteWriter {
  write(): number {
    return 0;
  }
}

/** Seekable whose relative seeks succeed but absolute seeks fail. */
export class BrokenRestoreStream implements ReadSeeker {
  readonly cursor: ByteCursor;

  constructor(data: readonly number[]) {
    this.cursor = ByteCursor.from(data);
  }

  read(buffer: Uint8Array): number {
    return this.cursor.read(buffer);
  }

  seek(pos: SeekFrom): number {
    if (pos.whence === 'start') {
      throw new StreamError('other', 'absolute seek unsupported');
    }
    return this.cursor.seek(pos);
  }
}

/** The value `fn` throws; fails the test when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}
