import { StreamError } from '../errors';
import { checkedAdd, isOffset } from './position';
import type { ByteReader, ByteWriter, SeekFrom, Seekable } from './types';

/**
 * In-memory seekable byte stream.
 * Manages a growable byte array with a byte-level cursor. Seeking past the
 * end is legal: reads there return 0 and writes zero-fill the gap.
 */
export class ByteCursor implements ByteReader, ByteWriter, Seekable {
  private _data: Uint8Array;
  private _length: number;
  private _position: number;

  private constructor(data: Uint8Array, length: number) {
    this._data = data;
    this._length = length;
    this._position = 0;
  }

  /** Allocate an empty cursor with optional initial byte capacity. */
  static alloc(initialCapacity = 256): ByteCursor {
    return new ByteCursor(new Uint8Array(Math.max(initialCapacity, 1)), 0);
  }

  /** Wrap a copy of existing bytes for reading. */
  static from(data: Uint8Array | readonly number[]): ByteCursor {
    const copy = Uint8Array.from(data);
    return new ByteCursor(copy, copy.length);
  }

  /** Number of valid bytes. */
  get length(): number {
    return this._length;
  }

  /** Current cursor position in bytes. */
  get position(): number {
    return this._position;
  }

  /** Bytes remaining from cursor to end (0 when positioned past the end). */
  get remaining(): number {
    return Math.max(this._length - this._position, 0);
  }

  read(buffer: Uint8Array): number {
    const count = Math.min(buffer.length, this.remaining);
    if (count === 0) return 0;
    buffer.set(this._data.subarray(this._position, this._position + count));
    this._position += count;
    return count;
  }

  write(data: Uint8Array): number {
    if (data.length === 0) return 0;
    const end = checkedAdd(this._position, data.length);
    if (end === undefined) {
      throw new StreamError('invalid-input', `ByteCursor: write of ${data.length} bytes overflows offset`);
    }
    // bytes past _length are never written, so a gap reads back as zeros
    this.ensureCapacity(end);
    this._data.set(data, this._position);
    this._position = end;
    if (end > this._length) {
      this._length = end;
    }
    return data.length;
  }

  seek(pos: SeekFrom): number {
    let target: number | undefined;
    switch (pos.whence) {
      case 'start':
        target = isOffset(pos.offset) ? pos.offset : undefined;
        break;
      case 'current':
        target = checkedAdd(this._position, pos.offset);
        break;
      case 'end':
        target = checkedAdd(this._length, pos.offset);
        break;
    }
    if (target === undefined) {
      throw new StreamError(
        'invalid-input',
        `ByteCursor: invalid seek to a negative or overflowing position (${pos.whence} ${pos.offset})`,
      );
    }
    this._position = target;
    return target;
  }

  /** Return a compact copy of the valid bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return hex string representation. */
  toHex(): string {
    return Array.from(this.toUint8Array()).map(b => b.toString(16).padStart(2, '0')).join('');
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._position = 0;
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = Math.max(this._data.length, 1);
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}
