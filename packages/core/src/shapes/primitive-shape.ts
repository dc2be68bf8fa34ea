/**
 * Fixed-width primitives: booleans, integers, floats and complex pairs.
 * Each consumes exactly its own width from the cursor. Single-byte kinds
 * read whole runs (list contents) in one bulk read.
 */

import type { ByteReader } from '../reader/byte-reader.js';
import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { type FillContext, type PrimitiveKind, Shape } from './shape.js';

export interface Complex {
  real: number;
  imag: number;
}

type PrimitiveReader<T> = (reader: ByteReader) => Result<T, ReadError>;
type RunReader<T> = (
  reader: ByteReader,
  count: number
) => Result<T[], ReadError>;

export class PrimitiveShape<
  T,
  K extends PrimitiveKind = PrimitiveKind,
> extends Shape<T> {
  constructor(
    readonly kind: K,
    private readonly read: PrimitiveReader<T>,
    private readonly zeroValue: () => T,
    private readonly readRun?: RunReader<T>
  ) {
    super();
  }

  zero(): T {
    return this.zeroValue();
  }

  fill(context: FillContext): Result<T, ReadError> {
    return this.read(context.reader);
  }

  fillRun(
    context: FillContext,
    count: number,
    depth: number
  ): Result<T[], ReadError> {
    if (this.readRun === undefined) {
      return super.fillRun(context, count, depth);
    }
    return this.readRun(context.reader, count);
  }
}

/**
 * One bulk read for a run of single-byte values
 */
function byteRun<T>(convert: (byte: number) => T): RunReader<T> {
  return (reader, count) => {
    const bytes = reader.readBytes(count);
    if (bytes.isErr()) return bytes;
    return ok(Array.from(bytes.value, convert));
  };
}

const asInt8 = (byte: number): number => (byte << 24) >> 24;

function readComplex(
  readPart: (reader: ByteReader) => Result<number, ReadError>
): PrimitiveReader<Complex> {
  return (reader) => {
    const real = readPart(reader);
    if (real.isErr()) return real;
    const imag = readPart(reader);
    if (imag.isErr()) return imag;
    return ok({ real: real.value, imag: imag.value });
  };
}

const zeroNumber = (): number => 0;
const zeroBigInt = (): bigint => 0n;

export const primitives = {
  bool: (): PrimitiveShape<boolean, 'bool'> =>
    new PrimitiveShape(
      'bool',
      (r) => r.readBool(),
      () => false,
      byteRun((byte) => byte % 2 === 0)
    ),
  int8: (): PrimitiveShape<number, 'int8'> =>
    new PrimitiveShape('int8', (r) => r.readInt8(), zeroNumber, byteRun(asInt8)),
  uint8: (): PrimitiveShape<number, 'uint8'> =>
    new PrimitiveShape(
      'uint8',
      (r) => r.readUint8(),
      zeroNumber,
      byteRun((byte) => byte)
    ),
  int16: (): PrimitiveShape<number, 'int16'> =>
    new PrimitiveShape('int16', (r) => r.readInt16(), zeroNumber),
  uint16: (): PrimitiveShape<number, 'uint16'> =>
    new PrimitiveShape('uint16', (r) => r.readUint16(), zeroNumber),
  int32: (): PrimitiveShape<number, 'int32'> =>
    new PrimitiveShape('int32', (r) => r.readInt32(), zeroNumber),
  uint32: (): PrimitiveShape<number, 'uint32'> =>
    new PrimitiveShape('uint32', (r) => r.readUint32(), zeroNumber),
  int64: (): PrimitiveShape<bigint, 'int64'> =>
    new PrimitiveShape('int64', (r) => r.readInt64(), zeroBigInt),
  uint64: (): PrimitiveShape<bigint, 'uint64'> =>
    new PrimitiveShape('uint64', (r) => r.readUint64(), zeroBigInt),
  float32: (): PrimitiveShape<number, 'float32'> =>
    new PrimitiveShape('float32', (r) => r.readFloat32(), zeroNumber),
  float64: (): PrimitiveShape<number, 'float64'> =>
    new PrimitiveShape('float64', (r) => r.readFloat64(), zeroNumber),
  complex64: (): PrimitiveShape<Complex, 'complex64'> =>
    new PrimitiveShape(
      'complex64',
      readComplex((r) => r.readFloat32()),
      () => ({ real: 0, imag: 0 })
    ),
  complex128: (): PrimitiveShape<Complex, 'complex128'> =>
    new PrimitiveShape(
      'complex128',
      readComplex((r) => r.readFloat64()),
      () => ({ real: 0, imag: 0 })
    ),
};
