import { guardWrite } from '../errors';
import { takeUntil } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

/**
 * Null-terminated byte string. Holds the bytes without the terminator.
 * Not a text type: bytes are not decoded, and embedded zeros are not
 * checked for.
 */
export class ZString {
  static readonly TERMINATOR = 0x00;

  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array | readonly number[]) {
    this.bytes = Uint8Array.from(bytes);
  }

  /** Build from a string of single-byte (latin1) characters. */
  static fromLatin1(text: string): ZString {
    return new ZString(Buffer.from(text, 'latin1'));
  }

  /** Byte count, terminator excluded. */
  get length(): number {
    return this.bytes.length;
  }

  get isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  toLatin1(): string {
    return Buffer.from(this.bytes).toString('latin1');
  }

  equals(other: ZString): boolean {
    return Buffer.from(this.bytes).equals(other.bytes);
  }
}

/** Codec for {@link ZString}. The context is ignored. */
export class ZStringCodec implements Codec<ZString, unknown> {
  parse(stream: ReadSeeker): ZString {
    return new ZString(takeUntil(stream, ZString.TERMINATOR, false));
  }

  writeTo(stream: ByteWriter, value: ZString): void {
    guardWrite(() => {
      writeAll(stream, value.bytes);
      writeAll(stream, Uint8Array.of(ZString.TERMINATOR));
    });
  }

  byteSize(value: ZString): number {
    return value.length + 1;
  }
}

export const zstring = new ZStringCodec();
