import { manyParse } from '../combinators';
import { guardWrite } from '../errors';
import { sequenceByteSize } from '../dataSize';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import { cloneContext, type Codec, type ContextCloner } from './Codec';

/**
 * Variable-length sequence that fills the rest of the stream.
 *
 * Parsing repeats the item codec until the stream is exhausted, so it is
 * normally run over a {@link BoundedStream}. Writing emits the items back to
 * back with no length prefix; framing is the caller's job.
 */
export class ManyCodec<T, D> implements Codec<T[], D> {
  readonly itemCodec: Codec<T, D>;
  private readonly cloner: ContextCloner<D>;

  constructor(itemCodec: Codec<T, D>, cloner: ContextCloner<D> = cloneContext) {
    this.itemCodec = itemCodec;
    this.cloner = cloner;
  }

  parse(stream: ReadSeeker, ctx: D): T[] {
    return manyParse(stream, this.itemCodec, ctx, this.cloner);
  }

  writeTo(stream: ByteWriter, value: readonly T[], ctx: D): void {
    for (const item of value) {
      this.itemCodec.writeTo(stream, item, guardWrite(() => this.cloner(ctx)));
    }
  }

  byteSize(value: readonly T[], ctx: D): number {
    return sequenceByteSize(this.itemCodec, value, ctx, this.cloner);
  }
}
