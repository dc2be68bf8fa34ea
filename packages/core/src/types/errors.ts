/**
 * Error hierarchy for bytefill
 * Structured errors with a stable code and typed context, returned through Result
 */

import { ErrorCode, getErrorTitle } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  requested?: number; // Number of bytes a read asked for
  position?: number; // Cursor offset when the error was raised
  length?: number; // Total buffer length
  setting?: string; // Configuration option name (e.g. 'sliceBounds')
  value?: unknown; // Rejected configuration value
  path?: string; // Filesystem path involved in an adapter failure
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  title: string;
  context?: ErrorContext;
  cause?: { name: string; message: string } | undefined;
}

export interface ByteFillErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all bytefill errors
 */
export abstract class ByteFillError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor({ message, errorCode, context, cause }: ByteFillErrorParams) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      title: getErrorTitle(this.errorCode),
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }
}

/**
 * Raised when fewer bytes remain than a read requested
 */
export class EndOfStreamError extends ByteFillError {
  constructor(params: { requested: number; position: number; length: number }) {
    const { requested, position, length } = params;
    super({
      message: `end of stream reached: could not read ${requested} bytes (position: ${position} / length: ${length})`,
      errorCode: ErrorCode.END_OF_STREAM,
      context: { requested, position, length },
    });
  }

  get requested(): number | undefined {
    return this.context?.requested;
  }
}

/**
 * Raised for read lengths that can never be satisfied (negative, fractional)
 */
export class InvalidRequestError extends ByteFillError {
  constructor(params: { requested: number; position: number }) {
    super({
      message: `attempted to read an invalid amount of bytes: ${params.requested}`,
      errorCode: ErrorCode.INVALID_READ_REQUEST,
      context: { requested: params.requested, position: params.position },
    });
  }
}

/**
 * Raised at construction when the buffer cannot seed the decision generator
 */
export class InsufficientSeedDataError extends ByteFillError {
  static readonly REQUIRED_BYTES = 8;

  constructor(params: { length: number; cause?: Error }) {
    super({
      message: `at least ${InsufficientSeedDataError.REQUIRED_BYTES} bytes are required to seed the decision generator, got ${params.length}`,
      errorCode: ErrorCode.INSUFFICIENT_SEED_DATA,
      context: {
        length: params.length,
        requested: InsufficientSeedDataError.REQUIRED_BYTES,
      },
      cause: params.cause,
    });
  }
}

/**
 * Configuration values out of range or inconsistent with each other
 */
export class InvalidConfigurationError extends ByteFillError {
  constructor(params: { message: string; setting: string; value: unknown }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_CONFIGURATION,
      context: { setting: params.setting, value: params.value },
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Any failure a read (and therefore a fill) can return
 */
export type ReadError = EndOfStreamError | InvalidRequestError;

export function isByteFillError(error: unknown): error is ByteFillError {
  return error instanceof ByteFillError;
}
