/**
 * Generic Value Populator
 *
 * Binds the cursor, the decision generator and a configuration snapshot into
 * the context shapes fill through. One populator serves one fill call, so a
 * configuration change never lands halfway through a structure.
 */

import type { DecisionGenerator } from '../decisions/decision-generator.js';
import type { ByteReader } from '../reader/byte-reader.js';
import type { AbsenceKind, FillContext, Shape } from '../shapes/shape.js';
import type { ReadError } from '../types/errors.js';
import type { ResolvedFillOptions, SizeBounds } from '../types/options.js';
import type { Result } from '../types/result.js';

export class Populator implements FillContext {
  constructor(
    readonly reader: ByteReader,
    private readonly decisions: DecisionGenerator,
    private readonly options: ResolvedFillOptions
  ) {}

  get fillPrivateFields(): boolean {
    return this.options.fillPrivateFields;
  }

  isAbsent(kind: AbsenceKind): boolean {
    return this.decisions.randomBool(this.options.nilBias[kind]);
  }

  skipField(): boolean {
    return this.decisions.randomBool(this.options.skipFieldBias);
  }

  sliceLength(): number {
    return this.size(this.options.sliceBounds);
  }

  mapSize(): number {
    return this.size(this.options.mapBounds);
  }

  stringLength(): number {
    return this.size(this.options.stringBounds);
  }

  canPopulateRecord(depth: number): boolean {
    const { depthLimit } = this.options;
    return depthLimit === 0 || depth < depthLimit;
  }

  /**
   * Populate `current` as a value of `shape`, starting at depth 0
   */
  populate<T>(shape: Shape<T>, current: T): Result<T, ReadError> {
    return shape.fill(this, current, 0);
  }

  private size(bounds: Readonly<SizeBounds>): number {
    return this.decisions.randomSize(bounds.min, bounds.max);
  }
}
