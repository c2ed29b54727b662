import { WriteError, guardParse, guardWrite } from '../errors';
import { sequenceByteSize } from '../dataSize';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import { cloneContext, type Codec, type ContextCloner } from './Codec';

/**
 * Fixed-length array codec: exactly `length` items, each parsed or written
 * in order with its own copy of the context.
 */
export class ArrayCodec<T, D> implements Codec<T[], D> {
  readonly itemCodec: Codec<T, D>;
  readonly length: number;
  private readonly cloner: ContextCloner<D>;

  constructor(itemCodec: Codec<T, D>, length: number, cloner: ContextCloner<D> = cloneContext) {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new Error(`ArrayCodec: length must be a non-negative integer, got ${length}`);
    }
    this.itemCodec = itemCodec;
    this.length = length;
    this.cloner = cloner;
  }

  parse(stream: ReadSeeker, ctx: D): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.length; i++) {
      result.push(this.itemCodec.parse(stream, guardParse(() => this.cloner(ctx))));
    }
    return result;
  }

  writeTo(stream: ByteWriter, value: readonly T[], ctx: D): void {
    if (value.length !== this.length) {
      throw new WriteError('invalid-value', `ArrayCodec: expected ${this.length} items, got ${value.length}`);
    }
    for (const item of value) {
      this.itemCodec.writeTo(stream, item, guardWrite(() => this.cloner(ctx)));
    }
  }

  byteSize(value: readonly T[], ctx: D): number {
    return sequenceByteSize(this.itemCodec, value, ctx, this.cloner);
  }
}
