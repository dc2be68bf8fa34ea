import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

/**
 * Optional owned reference: absent (`null`) with the pointer nil-bias,
 * otherwise a fresh default of the target type populated at the same depth.
 */
export class OptionalShape<T> extends Shape<T | null> {
  readonly kind = 'optional' as const;

  constructor(readonly target: Shape<T>) {
    super();
  }

  zero(): T | null {
    return null;
  }

  fill(
    context: FillContext,
    _current: T | null,
    depth: number
  ): Result<T | null, ReadError> {
    if (context.isAbsent('pointer')) {
      return ok(null);
    }
    // Dereferencing is not nesting
    return this.target.fill(context, this.target.zero(), depth);
  }
}
