/**
 * Byte cursor over an immutable buffer.
 * Every read is bounds-checked before the cursor advances; multi-byte values
 * are big-endian.
 */

import { Buffer } from 'node:buffer';
import {
  EndOfStreamError,
  InvalidRequestError,
  type ReadError,
} from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';

export class ByteReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = new Uint8Array(data);
    this.view = new DataView(
      this.data.buffer,
      this.data.byteOffset,
      this.data.byteLength
    );
  }

  /** Total number of bytes in the buffer. */
  get length(): number {
    return this.data.length;
  }

  /** Current cursor offset. */
  get position(): number {
    return this.offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this.data.length - this.offset;
  }

  /** Move the cursor back to the start of the buffer. */
  rewind(): void {
    this.offset = 0;
  }

  /**
   * Read `count` bytes. The returned array is a copy; the buffer is never
   * exposed for writing.
   */
  readBytes(count: number): Result<Uint8Array, ReadError> {
    const start = this.claim(count);
    if (start.isErr()) return start;
    return ok(this.data.slice(start.value, start.value + count));
  }

  readByte(): Result<number, ReadError> {
    const start = this.claim(1);
    if (start.isErr()) return start;
    return ok(this.data[start.value]);
  }

  /** True iff the byte read is even. */
  readBool(): Result<boolean, ReadError> {
    const byte = this.readByte();
    if (byte.isErr()) return byte;
    return ok(byte.value % 2 === 0);
  }

  readUint8(): Result<number, ReadError> {
    return this.readByte();
  }

  readInt8(): Result<number, ReadError> {
    const start = this.claim(1);
    if (start.isErr()) return start;
    return ok(this.view.getInt8(start.value));
  }

  readUint16(): Result<number, ReadError> {
    const start = this.claim(2);
    if (start.isErr()) return start;
    return ok(this.view.getUint16(start.value));
  }

  readInt16(): Result<number, ReadError> {
    const start = this.claim(2);
    if (start.isErr()) return start;
    return ok(this.view.getInt16(start.value));
  }

  readUint32(): Result<number, ReadError> {
    const start = this.claim(4);
    if (start.isErr()) return start;
    return ok(this.view.getUint32(start.value));
  }

  readInt32(): Result<number, ReadError> {
    const start = this.claim(4);
    if (start.isErr()) return start;
    return ok(this.view.getInt32(start.value));
  }

  readUint64(): Result<bigint, ReadError> {
    const start = this.claim(8);
    if (start.isErr()) return start;
    return ok(this.view.getBigUint64(start.value));
  }

  readInt64(): Result<bigint, ReadError> {
    const start = this.claim(8);
    if (start.isErr()) return start;
    return ok(this.view.getBigInt64(start.value));
  }

  /** IEEE-754 single precision from the big-endian bit pattern. */
  readFloat32(): Result<number, ReadError> {
    const start = this.claim(4);
    if (start.isErr()) return start;
    return ok(this.view.getFloat32(start.value));
  }

  /** IEEE-754 double precision from the big-endian bit pattern. */
  readFloat64(): Result<number, ReadError> {
    const start = this.claim(8);
    if (start.isErr()) return start;
    return ok(this.view.getFloat64(start.value));
  }

  /**
   * Read `count` raw bytes as text, one code unit per byte (latin1).
   * No decoding is attempted, so every byte survives unchanged.
   */
  readText(count: number): Result<string, ReadError> {
    const start = this.claim(count);
    if (start.isErr()) return start;
    const raw = Buffer.from(
      this.data.buffer,
      this.data.byteOffset + start.value,
      count
    );
    return ok(raw.toString('latin1'));
  }

  /**
   * Validate a read of `count` bytes and advance past it.
   * Returns the offset the read starts at.
   */
  private claim(count: number): Result<number, ReadError> {
    if (!Number.isInteger(count) || count < 0) {
      return err(
        new InvalidRequestError({ requested: count, position: this.offset })
      );
    }
    if (this.remaining < count) {
      return err(
        new EndOfStreamError({
          requested: count,
          position: this.offset,
          length: this.data.length,
        })
      );
    }
    const start = this.offset;
    this.offset += count;
    return ok(start);
  }
}
