import { type Result, ok } from '../types/result.js';
import { Shape } from './shape.js';

/**
 * Values the populator cannot produce (functions, handles, class instances
 * without a record description). They keep whatever they hold and consume
 * nothing, so a fuzz harness keeps running on partially supported types.
 */
export class OpaqueShape<T> extends Shape<T> {
  readonly kind = 'opaque' as const;

  constructor(private readonly create: () => T) {
    super();
  }

  zero(): T {
    return this.create();
  }

  fill(_context: unknown, current: T): Result<T, never> {
    return ok(current);
  }
}
