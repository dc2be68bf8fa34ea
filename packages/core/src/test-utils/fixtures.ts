import { FuzzInput } from '../fuzz-input.js';
import type { FillOptions } from '../types/options.js';

/** Bytes counting down from 255: [255, 254, ..., 255 - (length - 1)] */
export function descendingBytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (255 - i) & 0xff);
}

/** Eight zero seed bytes followed by `content` */
export function seeded(content: readonly number[] = []): Uint8Array {
  return Uint8Array.from([0, 0, 0, 0, 0, 0, 0, 0, ...content]);
}

/**
 * Options under which no decision is random: fixed sizes, nothing absent,
 * nothing skipped
 */
export function fixedOptions(size = 0, overrides: FillOptions = {}): FillOptions {
  return {
    sliceBounds: { min: size, max: size },
    mapBounds: { min: size, max: size },
    stringBounds: { min: size, max: size },
    nilBias: { map: 0, pointer: 0, slice: 0 },
    skipFieldBias: 0,
    ...overrides,
  };
}

export function createInput(
  data: Uint8Array,
  options: FillOptions = {}
): FuzzInput {
  return FuzzInput.create(data, options).unwrap();
}
