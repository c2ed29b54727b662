import type { Endian } from '../Endian';
import { WriteError, guardWrite } from '../errors';
import { take } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

export type BigIntegerWidth = 8 | 16;

export interface BigIntegerOptions {
  /** Width in bytes. */
  width: BigIntegerWidth;
  /** Two's complement when true. */
  signed: boolean;
}

const MASK_64 = (1n << 64n) - 1n;

/**
 * 64- and 128-bit integer codec over bigint.
 * A 128-bit value is two 64-bit halves, ordered per the byte order.
 */
export class BigIntegerCodec implements Codec<bigint> {
  readonly width: BigIntegerWidth;
  readonly signed: boolean;

  constructor(options: BigIntegerOptions) {
    this.width = options.width;
    this.signed = options.signed;
  }

  get bits(): number {
    return this.width * 8;
  }

  get min(): bigint {
    return this.signed ? -(1n << BigInt(this.bits - 1)) : 0n;
  }

  get max(): bigint {
    return this.signed ? (1n << BigInt(this.bits - 1)) - 1n : (1n << BigInt(this.bits)) - 1n;
  }

  get name(): string {
    return `${this.signed ? 'i' : 'u'}${this.bits}`;
  }

  parse(stream: ReadSeeker, endian: Endian): bigint {
    const bytes = take(stream, this.width);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const little = endian === 'little';
    let unsigned: bigint;
    if (this.width === 8) {
      unsigned = view.getBigUint64(0, little);
    } else {
      const first = view.getBigUint64(0, little);
      const second = view.getBigUint64(8, little);
      unsigned = little ? (second << 64n) | first : (first << 64n) | second;
    }
    return this.signed ? BigInt.asIntN(this.bits, unsigned) : unsigned;
  }

  writeTo(stream: ByteWriter, value: bigint, endian: Endian): void {
    if (typeof value !== 'bigint' || value < this.min || value > this.max) {
      throw new WriteError(
        'invalid-value',
        `${this.name}: value ${String(value)} out of range [${this.min}, ${this.max}]`,
      );
    }
    const unsigned = BigInt.asUintN(this.bits, value);
    const bytes = new Uint8Array(this.width);
    const view = new DataView(bytes.buffer);
    const little = endian === 'little';
    if (this.width === 8) {
      view.setBigUint64(0, unsigned, little);
    } else {
      const high = unsigned >> 64n;
      const low = unsigned & MASK_64;
      view.setBigUint64(0, little ? low : high, little);
      view.setBigUint64(8, little ? high : low, little);
    }
    guardWrite(() => writeAll(stream, bytes));
  }

  byteSize(): number {
    return this.width;
  }
}
