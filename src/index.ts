export { Endian, isEndian } from './Endian';
export {
  StreamError,
  ParseError,
  WriteError,
  EnumConversionError,
  ContextCloneError,
  guardParse,
  guardWrite,
} from './errors';
export type {
  StreamErrorCode,
  ParseErrorKind,
  ParseErrorOptions,
  WriteErrorKind,
} from './errors';
export { SeekFrom } from './stream/types';
export type { ByteReader, ByteWriter, Seekable, ReadSeeker, WriteSeeker } from './stream/types';
export {
  MAX_OFFSET,
  isOffset,
  checkedAdd,
  checkedSub,
  saturatingAdd,
  streamPosition,
  streamLength,
} from './stream/position';
export { readExact, readBestEffort, writeAll } from './stream/io';
export { ByteCursor } from './stream/ByteCursor';
export { FileStream } from './stream/FileStream';
export { BoundedStream } from './stream/BoundedStream';
export type { ByteRange } from './stream/BoundedStream';
export { cloneContext, parsePeek } from './codecs/Codec';
export type { Codec, Parser, Writer, Sized, ContextCloner } from './codecs/Codec';
export { IntegerCodec } from './codecs/IntegerCodec';
export type { IntegerOptions, IntegerWidth } from './codecs/IntegerCodec';
export { BigIntegerCodec } from './codecs/BigIntegerCodec';
export type { BigIntegerOptions, BigIntegerWidth } from './codecs/BigIntegerCodec';
export { FloatCodec } from './codecs/FloatCodec';
export type { FloatWidth } from './codecs/FloatCodec';
export { u8, i8, u16, i16, u32, i32, u64, i64, u128, i128, f32, f64, SCALARS } from './codecs/scalars';
export type { ScalarCodec } from './codecs/scalars';
export { ArrayCodec } from './codecs/ArrayCodec';
export { ManyCodec } from './codecs/ManyCodec';
export { BytesCodec } from './codecs/BytesCodec';
export { TagCodec } from './codecs/TagCodec';
export { ZString, ZStringCodec, zstring } from './codecs/ZStringCodec';
export { EnumCodec, enumFromValue } from './codecs/EnumCodec';
export type { EnumOptions } from './codecs/EnumCodec';
export { StructCodec } from './codecs/StructCodec';
export type { StructField } from './codecs/StructCodec';
export { single, take, takeUntil, tag, expectEnd, many, manyParse } from './combinators';
export { sequenceByteSize } from './dataSize';
export { FlagSet } from './flags';
