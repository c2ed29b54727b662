/** Byte order used to compose and decompose multi-byte values. */
export type Endian = 'little' | 'big';

export const Endian = {
  Little: 'little',
  Big: 'big',
} as const satisfies Record<string, Endian>;

/** Type guard for user-supplied byte order strings. */
export function isEndian(value: unknown): value is Endian {
  return value === Endian.Little || value === Endian.Big;
}
