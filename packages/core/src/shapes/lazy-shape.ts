import type { ReadError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

/**
 * Deferred reference to another shape, used to describe self-referential
 * types. Filling it is not nesting: the resolved shape fills at the same
 * depth. Cycles must pass through an optional, list or map, whose default is
 * absent; a record that directly contains itself has no finite default.
 */
export class LazyShape<T> extends Shape<T> {
  readonly kind = 'lazy' as const;
  private resolved: Shape<T> | undefined;

  constructor(private readonly resolve: () => Shape<T>) {
    super();
  }

  get target(): Shape<T> {
    this.resolved ??= this.resolve();
    return this.resolved;
  }

  zero(): T {
    return this.target.zero();
  }

  fill(context: FillContext, current: T, depth: number): Result<T, ReadError> {
    return this.target.fill(context, current, depth);
  }

  fillRun(
    context: FillContext,
    count: number,
    depth: number
  ): Result<T[], ReadError> {
    return this.target.fillRun(context, count, depth);
  }
}
