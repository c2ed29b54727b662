import type { Endian } from '../Endian';
import { WriteError, guardWrite } from '../errors';
import { take } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

export type FloatWidth = 4 | 8;

/**
 * IEEE 754 binary32 / binary64 codec.
 *
 * Values are JS numbers, so a signalling binary32 NaN comes back quieted
 * (bit 22 set) when written: `7f800001` is written as `7fc00001`. Quiet NaN
 * payloads, binary64 NaNs, signed zeros and infinities are written back
 * bit for bit. Parse with `u32` when the exact bits of a binary32 matter.
 */
export class FloatCodec implements Codec<number> {
  readonly width: FloatWidth;

  constructor(width: FloatWidth) {
    this.width = width;
  }

  get name(): string {
    return `f${this.width * 8}`;
  }

  parse(stream: ReadSeeker, endian: Endian): number {
    const bytes = take(stream, this.width);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return this.width === 4
      ? view.getFloat32(0, endian === 'little')
      : view.getFloat64(0, endian === 'little');
  }

  writeTo(stream: ByteWriter, value: number, endian: Endian): void {
    if (typeof value !== 'number') {
      throw new WriteError('invalid-value', `${this.name}: expected a number, got ${typeof value}`);
    }
    const bytes = new Uint8Array(this.width);
    const view = new DataView(bytes.buffer);
    if (this.width === 4) view.setFloat32(0, value, endian === 'little');
    else view.setFloat64(0, value, endian === 'little');
    guardWrite(() => writeAll(stream, bytes));
  }

  byteSize(): number {
    return this.width;
  }
}
