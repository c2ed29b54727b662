import { guardWrite } from '../errors';
import { tag } from '../combinators';
import { writeAll } from '../stream/io';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

/**
 * Constant byte sequence such as a file magic. Parsing verifies it,
 * writing emits it; the value carries no data.
 */
export class TagCodec implements Codec<void, unknown> {
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array | readonly number[] | string) {
    this.bytes = typeof bytes === 'string' ? latin1Bytes(bytes) : Uint8Array.from(bytes);
  }

  parse(stream: ReadSeeker): void {
    tag(stream, this.bytes);
  }

  writeTo(stream: ByteWriter): void {
    guardWrite(() => writeAll(stream, this.bytes));
  }

  byteSize(): number {
    return this.bytes.length;
  }
}

function latin1Bytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      throw new Error(`TagCodec: character '${text[i]}' is not a single byte`);
    }
    out[i] = code;
  }
  return out;
}
