import type { ReadError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import { type FillContext, Shape } from './shape.js';

/**
 * Text of a length drawn from the string bounds, taken byte-for-byte.
 */
export class StringShape extends Shape<string> {
  readonly kind = 'string' as const;

  zero(): string {
    return '';
  }

  fill(context: FillContext): Result<string, ReadError> {
    return context.reader.readText(context.stringLength());
  }
}
