import { cloneContext, type ContextCloner, type Sized } from './codecs/Codec';

/** Total bytes a sequence occupies: the sum of its elements' sizes. */
export function sequenceByteSize<T, D>(
  sized: Sized<T, D>,
  values: readonly T[],
  ctx: D,
  cloner: ContextCloner<D> = cloneContext,
): number {
  return values.reduce((total, value) => total + sized.byteSize(value, cloner(ctx)), 0);
}
