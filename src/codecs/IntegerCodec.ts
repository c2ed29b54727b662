import type { Endian } from '../Endian';
import { WriteError, guardWrite } from '../errors';
import { take } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

export type IntegerWidth = 1 | 2 | 4;

export interface IntegerOptions {
  /** Width in bytes. */
  width: IntegerWidth;
  /** Two's complement when true. */
  signed: boolean;
}

/**
 * Fixed-width integer codec for widths that fit a JS number.
 * Single-byte integers ignore the byte order.
 */
export class IntegerCodec implements Codec<number> {
  readonly width: IntegerWidth;
  readonly signed: boolean;

  constructor(options: IntegerOptions) {
    this.width = options.width;
    this.signed = options.signed;
  }

  /** Smallest encodable value. */
  get min(): number {
    return this.signed ? -(2 ** (this.width * 8 - 1)) : 0;
  }

  /** Largest encodable value. */
  get max(): number {
    return this.signed ? 2 ** (this.width * 8 - 1) - 1 : 2 ** (this.width * 8) - 1;
  }

  parse(stream: ReadSeeker, endian: Endian): number {
    const bytes = take(stream, this.width);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const little = endian === 'little';
    switch (this.width) {
      case 1:
        return this.signed ? view.getInt8(0) : view.getUint8(0);
      case 2:
        return this.signed ? view.getInt16(0, little) : view.getUint16(0, little);
      default:
        return this.signed ? view.getInt32(0, little) : view.getUint32(0, little);
    }
  }

  writeTo(stream: ByteWriter, value: number, endian: Endian): void {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      throw new WriteError(
        'invalid-value',
        `${this.name}: value ${value} out of range [${this.min}, ${this.max}]`,
      );
    }
    const bytes = new Uint8Array(this.width);
    const view = new DataView(bytes.buffer);
    const little = endian === 'little';
    switch (this.width) {
      case 1:
        if (this.signed) view.setInt8(0, value);
        else view.setUint8(0, value);
        break;
      case 2:
        if (this.signed) view.setInt16(0, value, little);
        else view.setUint16(0, value, little);
        break;
      default:
        if (this.signed) view.setInt32(0, value, little);
        else view.setUint32(0, value, little);
        break;
    }
    guardWrite(() => writeAll(stream, bytes));
  }

  byteSize(): number {
    return this.width;
  }

  /** Conventional short name, e.g. `u16` or `i32`. */
  get name(): string {
    return `${this.signed ? 'i' : 'u'}${this.width * 8}`;
  }
}
