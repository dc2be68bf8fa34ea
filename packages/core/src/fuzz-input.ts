/**
 * FuzzInput: the public face of bytefill.
 *
 * Wraps one buffer with its cursor, its decision generator (seeded from the
 * buffer's first 8 bytes) and its configuration. Instances are independent;
 * give each concurrent user its own instance over its own buffer.
 */

import { DecisionGenerator } from './decisions/decision-generator.js';
import { Populator } from './populator/populator.js';
import { ByteReader } from './reader/byte-reader.js';
import type { Shape } from './shapes/shape.js';
import {
  InsufficientSeedDataError,
  type InvalidConfigurationError,
  type ReadError,
} from './types/errors.js';
import {
  type FillOptions,
  type ResolvedFillOptions,
  type SizeBounds,
  resolveOptions,
} from './types/options.js';
import { type Result, ok, err } from './types/result.js';

export interface Biases {
  map: number;
  pointer: number;
  slice: number;
  skipField: number;
}

type ConfigResult = Result<void, InvalidConfigurationError>;

export class FuzzInput {
  private constructor(
    private readonly reader: ByteReader,
    private decisions: DecisionGenerator,
    private resolved: ResolvedFillOptions
  ) {}

  /**
   * Build an input over `data`. Fails when `data` cannot seed the decision
   * generator (fewer than 8 bytes) or `options` are invalid.
   */
  static create(
    data: Uint8Array,
    options: FillOptions = {}
  ): Result<FuzzInput, InsufficientSeedDataError | InvalidConfigurationError> {
    const resolved = resolveOptions(options);
    if (resolved.isErr()) return resolved;

    const reader = new ByteReader(data);
    const decisions = DecisionGenerator.fromReader(reader);
    if (decisions.isErr()) {
      return err(
        new InsufficientSeedDataError({
          length: data.length,
          cause: decisions.error,
        })
      );
    }
    return ok(new FuzzInput(reader, decisions.value, resolved.value));
  }

  /**
   * Rewind to the start and reseed from the first 8 bytes. Configuration is
   * kept.
   */
  reset(): Result<void, ReadError> {
    this.reader.rewind();
    const decisions = DecisionGenerator.fromReader(this.reader);
    if (decisions.isErr()) return decisions;
    this.decisions = decisions.value;
    return ok(undefined);
  }

  get position(): number {
    return this.reader.position;
  }

  get length(): number {
    return this.reader.length;
  }

  get remaining(): number {
    return this.reader.remaining;
  }

  get options(): ResolvedFillOptions {
    return this.resolved;
  }

  // ==========================================================================
  // Primitive accessors
  // ==========================================================================

  getByte(): Result<number, ReadError> {
    return this.reader.readByte();
  }

  getBool(): Result<boolean, ReadError> {
    return this.reader.readBool();
  }

  getInt8(): Result<number, ReadError> {
    return this.reader.readInt8();
  }

  getUint8(): Result<number, ReadError> {
    return this.reader.readUint8();
  }

  getInt16(): Result<number, ReadError> {
    return this.reader.readInt16();
  }

  getUint16(): Result<number, ReadError> {
    return this.reader.readUint16();
  }

  getInt32(): Result<number, ReadError> {
    return this.reader.readInt32();
  }

  getUint32(): Result<number, ReadError> {
    return this.reader.readUint32();
  }

  getInt64(): Result<bigint, ReadError> {
    return this.reader.readInt64();
  }

  getUint64(): Result<bigint, ReadError> {
    return this.reader.readUint64();
  }

  getFloat32(): Result<number, ReadError> {
    return this.reader.readFloat32();
  }

  getFloat64(): Result<number, ReadError> {
    return this.reader.readFloat64();
  }

  getFixedString(length: number): Result<string, ReadError> {
    return this.reader.readText(length);
  }

  getNBytes(length: number): Result<Uint8Array, ReadError> {
    return this.reader.readBytes(length);
  }

  /** Bytes of a length drawn from the slice bounds (no nil-bias). */
  getBytes(): Result<Uint8Array, ReadError> {
    const { min, max } = this.resolved.sliceBounds;
    return this.reader.readBytes(this.decisions.randomSize(min, max));
  }

  /** Text of a length drawn from the string bounds. */
  getString(): Result<string, ReadError> {
    const { min, max } = this.resolved.stringBounds;
    return this.reader.readText(this.decisions.randomSize(min, max));
  }

  // ==========================================================================
  // Population
  // ==========================================================================

  /**
   * Populate an existing value in place (records, fixed-size arrays) and
   * return it. On failure the target keeps whatever was written before the
   * failing read; discard it.
   */
  fill<T extends object>(target: T, shape: Shape<T>): Result<T, ReadError> {
    return this.populator().populate(shape, target);
  }

  /**
   * Populate a fresh default value of `shape`.
   */
  generate<T>(shape: Shape<T>): Result<T, ReadError> {
    return this.populator().populate(shape, shape.zero());
  }

  private populator(): Populator {
    return new Populator(this.reader, this.decisions, this.resolved);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /** Apply several options at once; nothing changes if any is invalid. */
  configure(options: FillOptions): ConfigResult {
    const resolved = resolveOptions(options, this.resolved);
    if (resolved.isErr()) return resolved;
    this.resolved = resolved.value;
    return ok(undefined);
  }

  getSliceBounds(): SizeBounds {
    return { ...this.resolved.sliceBounds };
  }

  setSliceBounds(min: number, max: number): ConfigResult {
    return this.configure({ sliceBounds: { min, max } });
  }

  getMapBounds(): SizeBounds {
    return { ...this.resolved.mapBounds };
  }

  setMapBounds(min: number, max: number): ConfigResult {
    return this.configure({ mapBounds: { min, max } });
  }

  getStringBounds(): SizeBounds {
    return { ...this.resolved.stringBounds };
  }

  setStringBounds(min: number, max: number): ConfigResult {
    return this.configure({ stringBounds: { min, max } });
  }

  getBiases(): Biases {
    const { nilBias, skipFieldBias } = this.resolved;
    return { ...nilBias, skipField: skipFieldBias };
  }

  setBiases(biases: Biases): ConfigResult {
    const { skipField, ...nilBias } = biases;
    return this.configure({ nilBias, skipFieldBias: skipField });
  }

  /** One nil-bias for maps, optional references and lists alike. */
  setNilBias(nilBias: number, skipField: number): ConfigResult {
    return this.setBiases({
      map: nilBias,
      pointer: nilBias,
      slice: nilBias,
      skipField,
    });
  }

  getDepthLimit(): number {
    return this.resolved.depthLimit;
  }

  /** 0 removes the limit. */
  setDepthLimit(depthLimit: number): ConfigResult {
    return this.configure({ depthLimit });
  }

  getFillPrivateFields(): boolean {
    return this.resolved.fillPrivateFields;
  }

  setFillPrivateFields(fillPrivateFields: boolean): ConfigResult {
    return this.configure({ fillPrivateFields });
  }
}
