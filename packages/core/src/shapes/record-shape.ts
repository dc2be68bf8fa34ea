/**
 * Composite records
 *
 * A record is populated only while its depth is under the depth limit (or
 * the limit is 0). Fields are visited in declaration order:
 *   1. skip-bias: a hit leaves the field untouched
 *   2. access: hidden or non-assignable fields need fillPrivateFields and a
 *      property that can still be redefined
 *   3. the field value is filled at depth + 1 and stored
 *
 * Hidden fields model members callers should not write directly (TypeScript
 * `private`, read-only or getter-backed properties). ECMAScript `#private`
 * fields are unreachable from outside their class and cannot be populated.
 */

import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

export interface HiddenField<T> {
  readonly hidden: true;
  readonly shape: Shape<T>;
}

export type FieldInput<T> = Shape<T> | HiddenField<T>;

export interface RecordField {
  readonly name: string;
  readonly shape: Shape<unknown>;
  readonly hidden: boolean;
}

type FieldAccess = 'assign' | 'define' | 'none';

export class RecordShape<T extends object> extends Shape<T> {
  readonly kind = 'record' as const;
  readonly fields: readonly RecordField[];

  constructor(
    private readonly create: () => T,
    fields: Record<string, FieldInput<unknown>>
  ) {
    super();
    this.fields = Object.entries(fields).map(([name, input]) =>
      input instanceof Shape
        ? { name, shape: input, hidden: false }
        : { name, shape: input.shape, hidden: true }
    );
  }

  zero(): T {
    return this.create();
  }

  fill(context: FillContext, current: T, depth: number): Result<T, ReadError> {
    if (!context.canPopulateRecord(depth)) {
      return ok(current);
    }

    const target = isObject(current) ? current : this.zero();
    for (const field of this.fields) {
      if (context.skipField()) {
        continue;
      }

      const access = resolveAccess(target, field, context.fillPrivateFields);
      if (access === 'none') {
        continue;
      }

      const value = field.shape.fill(
        context,
        Reflect.get(target, field.name),
        depth + 1
      );
      if (value.isErr()) return value;

      if (access === 'assign') {
        Reflect.set(target, field.name, value.value);
      } else {
        defineValue(target, field.name, value.value);
      }
    }
    return ok(target);
  }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function resolveAccess(
  target: object,
  field: RecordField,
  fillPrivateFields: boolean
): FieldAccess {
  if (!field.hidden && isAssignable(target, field.name)) {
    return 'assign';
  }
  if (fillPrivateFields && isDefinable(target, field.name)) {
    return 'define';
  }
  return 'none';
}

/**
 * Whether plain assignment would store a value on `target`
 */
function isAssignable(target: object, name: string): boolean {
  let holder: object | null = target;
  while (holder !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(holder, name);
    if (descriptor) {
      if (descriptor.get || descriptor.set) {
        return descriptor.set !== undefined;
      }
      if (descriptor.writable !== true) {
        return false;
      }
      return holder === target || Object.isExtensible(target);
    }
    holder = Object.getPrototypeOf(holder);
  }
  return Object.isExtensible(target);
}

/**
 * Whether an own data property can be (re)defined on `target`
 */
function isDefinable(target: object, name: string): boolean {
  const own = Object.getOwnPropertyDescriptor(target, name);
  if (own) {
    return own.configurable === true || own.writable === true;
  }
  return Object.isExtensible(target);
}

function defineValue(target: object, name: string, value: unknown): void {
  const own = Object.getOwnPropertyDescriptor(target, name);
  if (own && own.configurable !== true) {
    // Non-configurable but writable: storage can be written, not redefined
    Object.defineProperty(target, name, { value });
    return;
  }
  Object.defineProperty(target, name, {
    value,
    writable: own?.writable ?? true,
    enumerable: own?.enumerable ?? true,
    configurable: true,
  });
}
