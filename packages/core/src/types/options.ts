/**
 * Configuration options for value population
 *
 * All options are optional with the defaults below. Options are read-only
 * while a fill is in flight; FuzzInput swaps in a freshly resolved object
 * whenever a setter succeeds.
 */

import { InvalidConfigurationError } from './errors.js';
import { type Result, ok, err } from './result.js';

/**
 * Largest size a bound may name. Sizes are drawn from a uint32 generator.
 */
export const MAX_SIZE_BOUND = 0xffffffff;

/**
 * Inclusive size range for generated collections and strings
 */
export interface SizeBounds {
  min: number;
  max: number;
}

/**
 * Probability (0..1) that an optional/collection value resolves to absent
 */
export interface NilBiasOptions {
  /** Ordered maps (default: 0.05) */
  map?: number;
  /** Optional references (default: 0.05) */
  pointer?: number;
  /** Lists and byte blobs (default: 0.05) */
  slice?: number;
}

export interface FillOptions {
  /** List and byte blob lengths (default: 0..15) */
  sliceBounds?: SizeBounds;
  /** Ordered map sizes before duplicate keys collapse (default: 0..15) */
  mapBounds?: SizeBounds;
  /** String lengths in bytes (default: 0..15) */
  stringBounds?: SizeBounds;
  nilBias?: NilBiasOptions;
  /** Probability a record field is left untouched (default: 0) */
  skipFieldBias?: number;
  /** Maximum record nesting depth populated; 0 means unlimited (default: 0) */
  depthLimit?: number;
  /** Populate hidden/read-only record fields through property definition (default: true) */
  fillPrivateFields?: boolean;
}

export interface ResolvedFillOptions {
  readonly sliceBounds: Readonly<SizeBounds>;
  readonly mapBounds: Readonly<SizeBounds>;
  readonly stringBounds: Readonly<SizeBounds>;
  readonly nilBias: Readonly<Required<NilBiasOptions>>;
  readonly skipFieldBias: number;
  readonly depthLimit: number;
  readonly fillPrivateFields: boolean;
}

export const DEFAULT_OPTIONS: ResolvedFillOptions = {
  sliceBounds: { min: 0, max: 15 },
  mapBounds: { min: 0, max: 15 },
  stringBounds: { min: 0, max: 15 },
  nilBias: { map: 0.05, pointer: 0.05, slice: 0.05 },
  skipFieldBias: 0,
  depthLimit: 0,
  fillPrivateFields: true,
};

/**
 * Merge user options over a base (defaults when omitted) and validate the result
 */
export function resolveOptions(
  userOptions: FillOptions = {},
  base: ResolvedFillOptions = DEFAULT_OPTIONS
): Result<ResolvedFillOptions, InvalidConfigurationError> {
  const resolved: ResolvedFillOptions = {
    sliceBounds: { ...base.sliceBounds, ...userOptions.sliceBounds },
    mapBounds: { ...base.mapBounds, ...userOptions.mapBounds },
    stringBounds: { ...base.stringBounds, ...userOptions.stringBounds },
    nilBias: { ...base.nilBias, ...userOptions.nilBias },
    skipFieldBias: userOptions.skipFieldBias ?? base.skipFieldBias,
    depthLimit: userOptions.depthLimit ?? base.depthLimit,
    fillPrivateFields: userOptions.fillPrivateFields ?? base.fillPrivateFields,
  };

  const failure = validateOptions(resolved);
  return failure ? err(failure) : ok(resolved);
}

/**
 * Validate resolved options
 * Returns the first violation found, or undefined when the options are usable
 */
export function validateOptions(
  options: ResolvedFillOptions
): InvalidConfigurationError | undefined {
  return (
    validateBounds('sliceBounds', options.sliceBounds) ??
    validateBounds('mapBounds', options.mapBounds) ??
    validateBounds('stringBounds', options.stringBounds) ??
    validateBias('nilBias.map', options.nilBias.map) ??
    validateBias('nilBias.pointer', options.nilBias.pointer) ??
    validateBias('nilBias.slice', options.nilBias.slice) ??
    validateBias('skipFieldBias', options.skipFieldBias) ??
    validateDepthLimit(options.depthLimit) ??
    validateFlag('fillPrivateFields', options.fillPrivateFields)
  );
}

function validateBounds(
  setting: string,
  bounds: Readonly<SizeBounds>
): InvalidConfigurationError | undefined {
  const { min, max } = bounds;
  if (
    !Number.isInteger(min) ||
    !Number.isInteger(max) ||
    min < 0 ||
    max < min ||
    max > MAX_SIZE_BOUND
  ) {
    return new InvalidConfigurationError({
      message: `invalid ${setting} provided: min: ${min}, max: ${max} (expected integers with 0 <= min <= max <= ${MAX_SIZE_BOUND})`,
      setting,
      value: { min, max },
    });
  }
  return undefined;
}

function validateBias(
  setting: string,
  bias: number
): InvalidConfigurationError | undefined {
  if (typeof bias !== 'number' || !(bias >= 0 && bias <= 1)) {
    return new InvalidConfigurationError({
      message: `invalid ${setting} provided: ${String(bias)}. bias must be between [0,1]`,
      setting,
      value: bias,
    });
  }
  return undefined;
}

function validateDepthLimit(
  depthLimit: number
): InvalidConfigurationError | undefined {
  if (!Number.isSafeInteger(depthLimit) || depthLimit < 0) {
    return new InvalidConfigurationError({
      message: `invalid depth limit provided: ${depthLimit}. depth limit must be a non-negative integer`,
      setting: 'depthLimit',
      value: depthLimit,
    });
  }
  return undefined;
}

function validateFlag(
  setting: string,
  flag: boolean
): InvalidConfigurationError | undefined {
  if (typeof flag !== 'boolean') {
    return new InvalidConfigurationError({
      message: `${setting} must be boolean`,
      setting,
      value: flag,
    });
  }
  return undefined;
}
