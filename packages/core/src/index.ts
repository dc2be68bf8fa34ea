// @bytefill/core entry point
//
// Public API:
// - FuzzInput is the facade most harnesses need: primitive reads, configuration
//   and shape-directed population over one byte buffer.
// - The `s` builder describes the values to populate.
// - ByteReader, DecisionGenerator and Populator are exported for callers that
//   drive the pieces themselves.

export { FuzzInput, type Biases } from './fuzz-input.js';

// Shapes
export * from './shapes/index.js';

// Building blocks
export { ByteReader } from './reader/byte-reader.js';
export { DecisionGenerator } from './decisions/decision-generator.js';
export { Populator } from './populator/populator.js';
export { XorShift32, fnv1a32 } from './util/rng.js';

// Configuration
export {
  DEFAULT_OPTIONS,
  MAX_SIZE_BOUND,
  resolveOptions,
  validateOptions,
  type FillOptions,
  type NilBiasOptions,
  type ResolvedFillOptions,
  type SizeBounds,
} from './types/options.js';

// Results
export { Ok, Err, ok, err, type Result } from './types/result.js';

// Errors
export { ErrorCode, getErrorTitle } from './errors/codes.js';
export {
  ByteFillError,
  EndOfStreamError,
  InvalidRequestError,
  InsufficientSeedDataError,
  InvalidConfigurationError,
  isByteFillError,
  type ErrorContext,
  type ReadError,
  type SerializedError,
} from './types/errors.js';
