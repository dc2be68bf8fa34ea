/**
 * Decision Generator
 * Seeded source for collection sizes, absence and field-skip decisions.
 * It never decides byte content and never moves the cursor after seeding.
 */

import type { ByteReader } from '../reader/byte-reader.js';
import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { XorShift32 } from '../util/rng.js';

export class DecisionGenerator {
  private constructor(private readonly rng: XorShift32) {}

  /**
   * Read one int64 seed from the cursor (8 bytes) and build a generator from it
   */
  static fromReader(
    reader: ByteReader
  ): Result<DecisionGenerator, ReadError> {
    const seed = reader.readInt64();
    if (seed.isErr()) return seed;
    return ok(DecisionGenerator.fromSeed(seed.value));
  }

  static fromSeed(seed: bigint): DecisionGenerator {
    return new DecisionGenerator(XorShift32.fromSeed(seed));
  }

  /**
   * Uniform integer in [min, max]. A degenerate range returns `min`
   * without drawing.
   */
  randomSize(min: number, max: number): number {
    if (min === max) return min;
    return min + this.rng.nextBelow(max - min + 1);
  }

  /**
   * True with the given probability; always consumes exactly one draw.
   */
  randomBool(probability: number): boolean {
    return this.rng.nextFloat01() < probability;
  }
}
