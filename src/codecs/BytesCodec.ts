import { WriteError, guardWrite } from '../errors';
import { take } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

/** Raw fixed-length byte block. The context is ignored. */
export class BytesCodec implements Codec<Uint8Array, unknown> {
  readonly length: number;

  constructor(length: number) {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new Error(`BytesCodec: length must be a non-negative integer, got ${length}`);
    }
    this.length = length;
  }

  parse(stream: ReadSeeker): Uint8Array {
    return take(stream, this.length);
  }

  writeTo(stream: ByteWriter, value: Uint8Array): void {
    if (value.length !== this.length) {
      throw new WriteError('invalid-value', `BytesCodec: expected ${this.length} bytes, got ${value.length}`);
    }
    guardWrite(() => writeAll(stream, value));
  }

  byteSize(): number {
    return this.length;
  }
}
