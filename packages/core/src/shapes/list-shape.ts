/**
 * Variable-length sequences
 *
 * Lists draw the slice nil-bias and then a length from the slice bounds, then
 * fill their elements as one run (a bulk read for single-byte elements).
 * Byte blobs follow the same draw sequence and yield the run as a
 * Uint8Array, so `s.bytes()` and `s.list(s.uint8())` hold the same bytes for
 * the same input.
 */

import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

export class ListShape<E> extends Shape<E[] | null> {
  readonly kind = 'list' as const;

  constructor(readonly element: Shape<E>) {
    super();
  }

  zero(): E[] | null {
    return null;
  }

  fill(
    context: FillContext,
    _current: E[] | null,
    depth: number
  ): Result<E[] | null, ReadError> {
    if (context.isAbsent('slice')) {
      return ok(null);
    }

    // Sequence membership does not add nesting depth
    return this.element.fillRun(context, context.sliceLength(), depth);
  }
}

export class BytesShape extends Shape<Uint8Array | null> {
  readonly kind = 'bytes' as const;

  zero(): Uint8Array | null {
    return null;
  }

  fill(context: FillContext): Result<Uint8Array | null, ReadError> {
    if (context.isAbsent('slice')) {
      return ok(null);
    }
    return context.reader.readBytes(context.sliceLength());
  }
}
