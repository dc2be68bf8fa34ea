import { describe, it, expect } from 'vitest';
import {
  createInput,
  descendingBytes,
  fixedOptions,
  seeded,
} from '../../test-utils/fixtures.js';
import { s } from '../index.js';

describe('shapes', () => {
  describe('primitives', () => {
    it('consume exactly their own width', () => {
      const input = createInput(seeded([0x01, 0x02, 0xff]));

      expect(input.generate(s.uint16()).unwrap()).toBe(258);
      expect(input.generate(s.int8()).unwrap()).toBe(-1);
      expect(input.position).toBe(11);
    });

    it('read complex numbers as a real and an imaginary part', () => {
      const input = createInput(
        seeded([0x3f, 0x80, 0x00, 0x00, 0x40, 0x00, 0x00, 0x00])
      );

      expect(input.generate(s.complex64()).unwrap()).toEqual({
        real: 1,
        imag: 2,
      });
    });

    it('have zero defaults', () => {
      expect(s.bool().zero()).toBe(false);
      expect(s.float64().zero()).toBe(0);
      expect(s.uint64().zero()).toBe(0n);
      expect(s.complex128().zero()).toEqual({ real: 0, imag: 0 });
      expect(s.string().zero()).toBe('');
    });
  });

  describe('strings and byte blobs', () => {
    it('take their length from the string bounds', () => {
      const input = createInput(seeded([0x61, 0x62, 0x63]), fixedOptions(3));
      expect(input.generate(s.string()).unwrap()).toBe('abc');
    });

    it('read blobs in one run', () => {
      const input = createInput(seeded([9, 8, 7]), fixedOptions(2));
      expect(input.generate(s.bytes()).unwrap()).toEqual(Uint8Array.of(9, 8));
      expect(input.remaining).toBe(1);
    });

    it('produce the same content as a list of uint8', () => {
      const data = descendingBytes(64);
      const blob = createInput(data).generate(s.bytes()).unwrap();
      const listInput = createInput(data);
      const list = listInput.generate(s.list(s.uint8())).unwrap();

      expect(blob === null ? null : Array.from(blob)).toEqual(list);
    });
  });

  describe('lists', () => {
    it('fill each element in order', () => {
      const input = createInput(seeded([0xff, 0x01, 0x80]), fixedOptions(3));
      expect(input.generate(s.list(s.int8())).unwrap()).toEqual([-1, 1, -128]);
    });

    it('are absent with slice nil-bias 1 and consume no bytes', () => {
      const input = createInput(
        seeded([1, 2, 3]),
        fixedOptions(3, { nilBias: { map: 0, pointer: 0, slice: 1 } })
      );

      expect(input.generate(s.list(s.uint8())).unwrap()).toBeNull();
      expect(input.generate(s.bytes()).unwrap()).toBeNull();
      expect(input.position).toBe(8);
    });

    it('read single-byte elements as one run', () => {
      const input = createInput(seeded([0, 1, 2, 9]), fixedOptions(3));

      expect(input.generate(s.list(s.bool())).unwrap()).toEqual([
        true,
        false,
        true,
      ]);
      expect(input.remaining).toBe(1);
    });

    it('fill lists of optional bytes element by element', () => {
      const input = createInput(seeded([4, 5]), fixedOptions(2));
      expect(input.generate(s.list(s.optional(s.uint8()))).unwrap()).toEqual([
        4, 5,
      ]);
    });

    it('can be empty but present', () => {
      const input = createInput(seeded(), fixedOptions(0));
      expect(input.generate(s.list(s.uint8())).unwrap()).toEqual([]);
    });
  });

  describe('fixed-size arrays', () => {
    it('are always fully populated', () => {
      const input = createInput(
        seeded([0xff, 0x01, 0x80]),
        fixedOptions(0, { nilBias: { map: 1, pointer: 1, slice: 1 } })
      );
      expect(input.generate(s.array(s.int8(), 3)).unwrap()).toEqual([
        -1, 1, -128,
      ]);
    });

    it('populate an existing array in place', () => {
      const target = [0, 0];
      const input = createInput(seeded([4, 5]));
      const result = input.fill(target, s.array(s.uint8(), 2)).unwrap();

      expect(result).toBe(target);
      expect(target).toEqual([4, 5]);
    });

    it('reject invalid lengths', () => {
      expect(() => s.array(s.uint8(), -1)).toThrow(RangeError);
      expect(() => s.array(s.uint8(), 1.5)).toThrow(RangeError);
    });
  });

  describe('maps', () => {
    it('let later duplicate keys overwrite earlier ones', () => {
      const input = createInput(
        seeded([1, 10, 1, 20, 2, 30]),
        fixedOptions(3)
      );
      const map = input.generate(s.map(s.uint8(), s.uint8())).unwrap();

      expect(map).toEqual(
        new Map([
          [1, 20],
          [2, 30],
        ])
      );
      expect(input.remaining).toBe(0);
    });

    it('compare record keys structurally', () => {
      const input = createInput(seeded([5, 1, 5, 2]), fixedOptions(2));
      const map = input
        .generate(s.map(s.struct({ id: s.uint8() }), s.uint8()))
        .unwrap();

      expect(map?.size).toBe(1);
      expect([...(map?.entries() ?? [])]).toEqual([[{ id: 5 }, 2]]);
    });

    it('deduplicate many record keys in one pass', () => {
      const content: number[] = [];
      for (let i = 0; i < 5000; i++) {
        content.push(i % 256, (i >> 8) & 0xff);
      }
      const input = createInput(
        seeded(content),
        fixedOptions(0, { mapBounds: { min: 5000, max: 5000 } })
      );
      const map = input
        .generate(s.map(s.struct({ a: s.uint8() }), s.uint8()))
        .unwrap();

      expect(map?.size).toBe(256);
      const entries = [...(map?.entries() ?? [])];
      expect(entries[0]).toEqual([{ a: 0 }, 19]);
      expect(entries[135]).toEqual([{ a: 135 }, 19]);
      expect(entries[136]).toEqual([{ a: 136 }, 18]);
      expect(entries[255]).toEqual([{ a: 255 }, 18]);
      expect(input.remaining).toBe(0);
    });

    it('treat -0 and +0 as the same key for floats and complex values', () => {
      const floats = createInput(
        seeded([0x80, 0, 0, 0, 1, 0, 0, 0, 0, 2]),
        fixedOptions(2)
      )
        .generate(s.map(s.float32(), s.uint8()))
        .unwrap();
      const complexes = createInput(
        seeded([0x80, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 2]),
        fixedOptions(2)
      )
        .generate(s.map(s.complex64(), s.uint8()))
        .unwrap();

      expect(floats?.size).toBe(1);
      expect(floats?.get(0)).toBe(2);
      expect(complexes?.size).toBe(1);
      const keys = [...(complexes?.keys() ?? [])];
      expect(Object.is(keys[0]?.real, -0)).toBe(true);
      expect([...(complexes?.values() ?? [])]).toEqual([2]);
    });

    it('treat NaN keys as equal for floats and complex values', () => {
      const nan = [0x7f, 0xc0, 0, 0];
      const floats = createInput(seeded([...nan, 1, ...nan, 2]), fixedOptions(2))
        .generate(s.map(s.float32(), s.uint8()))
        .unwrap();
      const complexes = createInput(
        seeded([...nan, ...nan, 1, ...nan, ...nan, 2]),
        fixedOptions(2)
      )
        .generate(s.map(s.complex64(), s.uint8()))
        .unwrap();

      expect(floats?.size).toBe(1);
      expect(complexes?.size).toBe(1);
      expect([...(complexes?.values() ?? [])]).toEqual([2]);
    });

    it('are absent with map nil-bias 1', () => {
      const input = createInput(
        seeded([1, 2]),
        fixedOptions(1, { nilBias: { map: 1, pointer: 0, slice: 0 } })
      );
      expect(input.generate(s.map(s.uint8(), s.uint8())).unwrap()).toBeNull();
      expect(input.position).toBe(8);
    });
  });

  describe('optionals', () => {
    it('hold a populated value when present', () => {
      const input = createInput(seeded([7]), fixedOptions());
      expect(input.generate(s.optional(s.uint8())).unwrap()).toBe(7);
    });

    it('are absent with pointer nil-bias 1', () => {
      const input = createInput(
        seeded([7]),
        fixedOptions(0, { nilBias: { map: 0, pointer: 1, slice: 0 } })
      );
      expect(input.generate(s.optional(s.uint8())).unwrap()).toBeNull();
      expect(input.position).toBe(8);
    });
  });

  describe('opaque values', () => {
    it('keep their value and consume nothing', () => {
      const handle = (): string => 'handle';
      const Holder = s.struct({ run: s.opaque(() => handle), n: s.uint8() });
      const input = createInput(seeded([3]), fixedOptions());
      const value = input.generate(Holder).unwrap();

      expect(value.run).toBe(handle);
      expect(value.n).toBe(3);
      expect(input.remaining).toBe(0);
    });
  });

  describe('failures', () => {
    it('return end of stream from nested reads', () => {
      const input = createInput(seeded([1]), fixedOptions(2));
      const result = input.generate(s.list(s.uint8()));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.errorCode).toBe('E100');
      }
    });
  });
});
