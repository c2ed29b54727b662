/**
 * Named view over the bits of an integer flags field.
 *
 *   const flags = FlagSet.masks(raw, { hasName: 0b01, hasId: 0b10 });
 *   flags.has('hasId');
 *
 * `FlagSet.shifts` takes bit indices instead of masks.
 */
export class FlagSet<K extends string> {
  readonly value: number;
  private readonly masks: Readonly<Record<K, number>>;

  private constructor(value: number, masks: Readonly<Record<K, number>>) {
    if (!isUint32(value)) {
      throw new Error(`FlagSet: value must be a 32-bit unsigned integer, got ${value}`);
    }
    this.value = value;
    this.masks = masks;
  }

  /** Flags defined by bit masks. */
  static masks<K extends string>(value: number, masks: Readonly<Record<K, number>>): FlagSet<K> {
    for (const flag of keysOf(masks)) {
      const mask = masks[flag];
      if (!isUint32(mask) || mask === 0) {
        throw new Error(`FlagSet: mask for '${flag}' must be in 1..0xffffffff, got ${mask}`);
      }
    }
    return new FlagSet(value, masks);
  }

  /** Flags defined by bit index: flag `k` is set when `value & (1 << bits[k])`. */
  static shifts<K extends string>(value: number, bits: Readonly<Record<K, number>>): FlagSet<K> {
    return new FlagSet(value, mapValues(bits, bit => {
      if (!Number.isInteger(bit) || bit < 0 || bit > 31) {
        throw new Error(`FlagSet: bit index must be 0..31, got ${bit}`);
      }
      return 2 ** bit;
    }));
  }

  has(flag: K): boolean {
    return (this.value & this.masks[flag]) !== 0;
  }

  /** A copy with `flag` set or cleared. */
  with(flag: K, on: boolean): FlagSet<K> {
    const mask = this.masks[flag];
    const value = on ? (this.value | mask) >>> 0 : (this.value & ~mask) >>> 0;
    return new FlagSet(value, this.masks);
  }

  /** Names of the flags currently set, in definition order. */
  set(): K[] {
    return keysOf(this.masks).filter(flag => this.has(flag));
  }
}

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

function keysOf<K extends string>(record: Readonly<Record<K, number>>): K[] {
  const keys: K[] = [];
  for (const key in record) {
    keys.push(key);
  }
  return keys;
}

function mapValues<K extends string>(
  record: Readonly<Record<K, number>>,
  fn: (value: number) => number,
): Record<K, number> {
  const result: Record<K, number> = { ...record };
  for (const key of keysOf(record)) {
    result[key] = fn(record[key]);
  }
  return result;
}
