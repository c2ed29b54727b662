import { BigIntegerCodec } from './BigIntegerCodec';
import { FloatCodec } from './FloatCodec';
import { IntegerCodec } from './IntegerCodec';

export const u8 = new IntegerCodec({ width: 1, signed: false });
export const i8 = new IntegerCodec({ width: 1, signed: true });
export const u16 = new IntegerCodec({ width: 2, signed: false });
export const i16 = new IntegerCodec({ width: 2, signed: true });
export const u32 = new IntegerCodec({ width: 4, signed: false });
export const i32 = new IntegerCodec({ width: 4, signed: true });
export const u64 = new BigIntegerCodec({ width: 8, signed: false });
export const i64 = new BigIntegerCodec({ width: 8, signed: true });
export const u128 = new BigIntegerCodec({ width: 16, signed: false });
export const i128 = new BigIntegerCodec({ width: 16, signed: true });
export const f32 = new FloatCodec(4);
export const f64 = new FloatCodec(8);

export type ScalarCodec = IntegerCodec | BigIntegerCodec | FloatCodec;

/** Scalar codecs by conventional name. */
export const SCALARS: Readonly<Record<string, ScalarCodec>> = {
  u8, i8, u16, i16, u32, i32, u64, i64, u128, i128, f32, f64,
};
