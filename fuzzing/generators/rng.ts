/**
 * Seeded PRNG (xorshift32), so every fuzz failure can be replayed from its
 * seed.
 */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves the all-zero state
    this.state = (seed | 0) === 0 ? 0x2545f491 : seed | 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  bytes(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) out[i] = this.int(0, 255);
    return out;
  }
}
