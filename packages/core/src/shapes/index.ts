/**
 * Shape builder
 *
 * ```ts
 * const User = s.struct({
 *   id: s.uint32(),
 *   name: s.string(),
 *   avatar: s.bytes(),
 *   friends: s.list(s.lazy((): Shape<UserT> => User)),
 * });
 * ```
 */

import { ArrayShape } from './array-shape.js';
import { LazyShape } from './lazy-shape.js';
import { BytesShape, ListShape } from './list-shape.js';
import { MapShape } from './map-shape.js';
import { OpaqueShape } from './opaque-shape.js';
import { OptionalShape } from './optional-shape.js';
import { primitives } from './primitive-shape.js';
import {
  type FieldInput,
  type HiddenField,
  RecordShape,
} from './record-shape.js';
import { type Infer, Shape } from './shape.js';
import { StringShape } from './string-shape.js';

export type FieldMap = Record<string, FieldInput<unknown>>;

type InferField<F> = F extends HiddenField<infer T> ? T : Infer<F>;

export type StructOf<F extends FieldMap> = {
  -readonly [K in keyof F]: InferField<F[K]>;
};

/**
 * Fields of a class-backed record. Public members are checked against the
 * class; any other name (hidden members) is accepted.
 */
export type RecordFields<T> = {
  [K in keyof T]?: FieldInput<T[K]>;
} & FieldMap;

function struct<F extends FieldMap>(fields: F): RecordShape<StructOf<F>> {
  const create = (): StructOf<F> => {
    const out: Record<string, unknown> = {};
    for (const [name, input] of Object.entries(fields)) {
      out[name] = input instanceof Shape ? input.zero() : input.shape.zero();
    }
    return out as StructOf<F>;
  };
  return new RecordShape(create, fields);
}

export const s = {
  ...primitives,
  string: (): StringShape => new StringShape(),
  /**
   * Variable-length byte blob. Draws like `s.list(s.uint8())` but reads its
   * content in one bulk read and yields a Uint8Array.
   */
  bytes: (): BytesShape => new BytesShape(),
  list: <E>(element: Shape<E>): ListShape<E> => new ListShape(element),
  map: <K, V>(key: Shape<K>, value: Shape<V>): MapShape<K, V> =>
    new MapShape(key, value),
  optional: <T>(target: Shape<T>): OptionalShape<T> => new OptionalShape(target),
  array: <E>(element: Shape<E>, length: number): ArrayShape<E> =>
    new ArrayShape(element, length),
  /** Plain-object record whose type is inferred from its fields */
  struct,
  /** Record backed by instances from `create`, e.g. a class constructor */
  record: <T extends object>(
    create: () => T,
    fields: RecordFields<T>
  ): RecordShape<T> => new RecordShape(create, fields),
  /** Marks a record field as not ordinarily writable */
  hidden: <T>(shape: Shape<T>): HiddenField<T> => ({ hidden: true, shape }),
  lazy: <T>(resolve: () => Shape<T>): LazyShape<T> => new LazyShape(resolve),
  opaque: <T>(create: () => T): OpaqueShape<T> => new OpaqueShape(create),
};

export { Shape, type Infer } from './shape.js';
export type {
  AbsenceKind,
  FillContext,
  PrimitiveKind,
  ShapeKind,
} from './shape.js';
export { PrimitiveShape, type Complex } from './primitive-shape.js';
export { StringShape } from './string-shape.js';
export { BytesShape, ListShape } from './list-shape.js';
export { MapShape } from './map-shape.js';
export { OptionalShape } from './optional-shape.js';
export { ArrayShape } from './array-shape.js';
export {
  RecordShape,
  type FieldInput,
  type HiddenField,
  type RecordField,
} from './record-shape.js';
export { LazyShape } from './lazy-shape.js';
export { OpaqueShape } from './opaque-shape.js';
