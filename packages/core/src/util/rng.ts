// Seeded RNG utilities backing the decision generator

/**
 * 32-bit FNV-1a hash over bytes.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(bytes: Uint8Array): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    x ^= bytes[i];
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

const UINT32_RANGE = 0x100000000;
// xorshift32 never leaves the all-zero state
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * xorshift32 RNG with uint32 state.
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 * next() returns x >>> 0
 */
export class XorShift32 {
  private x: number;

  constructor(state: number) {
    const x = state >>> 0;
    this.x = x === 0 ? ZERO_STATE_REPLACEMENT : x;
  }

  /**
   * Derive the state from a signed 64-bit seed: FNV-1a over its 8 big-endian bytes.
   */
  static fromSeed(seed: bigint): XorShift32 {
    const bytes = new Uint8Array(8);
    new DataView(bytes.buffer).setBigInt64(0, BigInt.asIntN(64, seed));
    return new XorShift32(fnv1a32(bytes));
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return this.next() / UINT32_RANGE;
  }

  /**
   * Returns a uniform integer in [0, bound) for 1 <= bound <= 2^32.
   * Draws falling in the incomplete top bucket are rejected.
   */
  nextBelow(bound: number): number {
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    let draw = this.next();
    while (draw >= limit) {
      draw = this.next();
    }
    return draw % bound;
  }
}
