/**
 * Shape base class and fill context
 *
 * A shape is the runtime description of a value's type. The populator walks
 * shapes instead of reflecting over values: each shape knows its default
 * value and how to populate a slot of its type from the fill context.
 */

import type { ByteReader } from '../reader/byte-reader.js';
import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';

export type PrimitiveKind =
  | 'bool'
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64'
  | 'complex64'
  | 'complex128';

export type ShapeKind =
  | PrimitiveKind
  | 'string'
  | 'bytes'
  | 'list'
  | 'map'
  | 'optional'
  | 'array'
  | 'record'
  | 'lazy'
  | 'opaque';

/**
 * Which nil-bias governs an absence decision
 */
export type AbsenceKind = 'map' | 'pointer' | 'slice';

/**
 * Everything a shape may consult while filling.
 * Content comes from `reader`; every size and yes/no decision comes from
 * the seeded decision generator behind the other methods.
 */
export interface FillContext {
  readonly reader: ByteReader;
  readonly fillPrivateFields: boolean;
  isAbsent(kind: AbsenceKind): boolean;
  skipField(): boolean;
  sliceLength(): number;
  mapSize(): number;
  stringLength(): number;
  canPopulateRecord(depth: number): boolean;
}

/**
 * Abstract base class for all shapes
 */
export abstract class Shape<T> {
  abstract readonly kind: ShapeKind;

  /**
   * Default value of the type: what an unpopulated slot holds
   */
  abstract zero(): T;

  /**
   * Populate a slot currently holding `current`, returning the new value.
   * Records and fixed-size arrays populate `current` in place; every other
   * shape builds a new value.
   */
  abstract fill(
    context: FillContext,
    current: T,
    depth: number
  ): Result<T, ReadError>;

  /**
   * Populate `count` fresh values in order. Shapes with a faster path for
   * runs (single-byte primitives) override this; the draws and bytes consumed
   * must match the element-by-element loop.
   */
  fillRun(
    context: FillContext,
    count: number,
    depth: number
  ): Result<T[], ReadError> {
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      const item = this.fill(context, this.zero(), depth);
      if (item.isErr()) return item;
      items.push(item.value);
    }
    return ok(items);
  }
}

/**
 * Value type described by a shape
 */
export type Infer<S> = S extends Shape<infer T> ? T : never;
