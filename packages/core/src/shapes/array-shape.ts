import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

/**
 * Fixed-size array. Always fully populated in index order; there is no
 * absent representation.
 */
export class ArrayShape<E> extends Shape<E[]> {
  readonly kind = 'array' as const;

  constructor(
    readonly element: Shape<E>,
    readonly length: number
  ) {
    super();
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new RangeError(
        `array length must be a non-negative integer, got ${length}`
      );
    }
  }

  zero(): E[] {
    return Array.from({ length: this.length }, () => this.element.zero());
  }

  fill(
    context: FillContext,
    current: E[],
    depth: number
  ): Result<E[], ReadError> {
    const items =
      Array.isArray(current) && current.length === this.length
        ? current
        : this.zero();
    for (let i = 0; i < items.length; i++) {
      const item = this.element.fill(context, items[i], depth);
      if (item.isErr()) return item;
      items[i] = item.value;
    }
    return ok(items);
  }
}
