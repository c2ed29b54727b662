import type { Endian } from '../Endian';
import { EnumConversionError, WriteError, guardParse } from '../errors';
import type { ByteWriter, ReadSeeker } from '../stream/types';
import type { Codec } from './Codec';

/**
 * Look up the member whose value is `value`.
 * Throws EnumConversionError when no member matches.
 */
export function enumFromValue<K extends string>(
  members: Readonly<Record<K, number>>,
  value: number,
  typeName?: string,
): K {
  for (const key of Object.keys(members)) {
    if (isMember(members, key) && members[key] === value) return key;
  }
  throw new EnumConversionError(value, typeName);
}

function isMember<K extends string>(members: Readonly<Record<K, number>>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(members, key);
}

export interface EnumOptions<K extends string> {
  /** Integer codec carrying the raw value. */
  codec: Codec<number>;
  /** Member name to raw value. */
  members: Readonly<Record<K, number>>;
  /** Name used in error messages. */
  typeName?: string;
}

/**
 * Closed set of named integer values.
 * Raw values without a member fail with ParseError kind 'invalid-enum'.
 */
export class EnumCodec<K extends string> implements Codec<K> {
  private readonly codec: Codec<number>;
  private readonly members: Readonly<Record<K, number>>;
  private readonly typeName?: string;

  constructor(options: EnumOptions<K>) {
    if (Object.keys(options.members).length === 0) {
      throw new Error('EnumCodec: at least one member is required');
    }
    this.codec = options.codec;
    this.members = options.members;
    this.typeName = options.typeName;
  }

  parse(stream: ReadSeeker, endian: Endian): K {
    const raw = this.codec.parse(stream, endian);
    return guardParse(() => enumFromValue(this.members, raw, this.typeName));
  }

  writeTo(stream: ByteWriter, value: K, endian: Endian): void {
    if (!isMember(this.members, value)) {
      throw new WriteError('invalid-value', `Unknown ${this.typeName ?? 'enumeration'} member: '${value}'`);
    }
    this.codec.writeTo(stream, this.members[value], endian);
  }

  byteSize(value: K, endian: Endian): number {
    return this.codec.byteSize(this.members[value], endian);
  }
}
