import type { Endian } from '../Endian';
import { WriteError } from '../errors';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

export interface StructField {
  /** Key in the decoded record. */
  name: string;
  /** Codec for this field's type. */
  codec: Codec<unknown>;
  /** Byte order for this field, overriding the one passed to the struct. */
  endian?: Endian;
}

/**
 * Record of named fields laid out back to back in declaration order.
 */
export class StructCodec implements Codec<Record<string, unknown>> {
  readonly fields: readonly StructField[];

  constructor(fields: readonly StructField[]) {
    const seen = new Set<string>();
    for (const field of fields) {
      if (field.name === '__proto__') {
        throw new Error("StructCodec: field name '__proto__' is reserved");
      }
      if (seen.has(field.name)) {
        throw new Error(`StructCodec: duplicate field '${field.name}'`);
      }
      seen.add(field.name);
    }
    this.fields = fields;
  }

  parse(stream: ReadSeeker, endian: Endian): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const field of this.fields) {
      result[field.name] = field.codec.parse(stream, field.endian ?? endian);
    }
    return result;
  }

  writeTo(stream: ByteWriter, value: Record<string, unknown>, endian: Endian): void {
    for (const field of this.fields) {
      if (!(field.name in value)) {
        throw new WriteError('invalid-value', `Missing struct field: '${field.name}'`);
      }
      field.codec.writeTo(stream, value[field.name], field.endian ?? endian);
    }
  }

  byteSize(value: Record<string, unknown>, endian: Endian): number {
    let total = 0;
    for (const field of this.fields) {
      total += field.codec.byteSize(value[field.name], field.endian ?? endian);
    }
    return total;
  }
}
