/**
 * Fast-check arbitraries for fuzz buffers and fill configuration.
 */

import * as fc from 'fast-check';

import type {
  FillOptions,
  SizeBounds,
} from '../../packages/core/src/index.js';

/**
 * Helper to create consistent bounds ensuring min <= max
 */
export const createBounds = (
  min: number,
  max: number
): fc.Arbitrary<SizeBounds> =>
  fc
    .tuple(fc.integer({ min, max }), fc.integer({ min, max }))
    .map(([a, b]) => (a <= b ? { min: a, max: b } : { min: b, max: a }));

export const biasArb: fc.Arbitrary<number> = fc.oneof(
  fc.constantFrom(0, 1),
  fc.double({ min: 0, max: 1, noNaN: true })
);

/**
 * Valid options with small sizes so generated values stay cheap
 */
export const fillOptionsArb: fc.Arbitrary<FillOptions> = fc.record({
  sliceBounds: createBounds(0, 8),
  mapBounds: createBounds(0, 8),
  stringBounds: createBounds(0, 8),
  nilBias: fc.record({ map: biasArb, pointer: biasArb, slice: biasArb }),
  skipFieldBias: biasArb,
  depthLimit: fc.integer({ min: 0, max: 4 }),
  fillPrivateFields: fc.boolean(),
});

/**
 * Buffers long enough to seed, plus between `minContent` and `maxContent`
 * bytes of content
 */
export const fuzzDataArb = (
  maxContent = 256,
  minContent = 0
): fc.Arbitrary<Uint8Array> =>
  fc.uint8Array({ minLength: 8 + minContent, maxLength: 8 + maxContent });

export const invalidBoundsArb: fc.Arbitrary<SizeBounds> = fc.oneof(
  fc
    .tuple(fc.nat({ max: 1000 }), fc.integer({ min: 1, max: 1000 }))
    .map(([max, gap]) => ({ min: max + gap, max })),
  fc.integer({ min: -1000, max: -1 }).map((min) => ({ min, max: 10 })),
  fc.constant({ min: 0, max: 0x100000000 })
);
