import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import {
  EndOfStreamError,
  InvalidRequestError,
  type ReadError,
} from '../../types/errors.js';
import type { Result } from '../../types/result.js';
import { descendingBytes } from '../../test-utils/fixtures.js';
import { ByteReader } from '../byte-reader.js';

describe('ByteReader', () => {
  describe('fixed-width reads', () => {
    it('decodes big-endian values in order', () => {
      const reader = new ByteReader(descendingBytes(256));
      reader.readBytes(8);

      expect(reader.readByte().unwrap()).toBe(0xf7);
      expect(reader.readInt16().unwrap()).toBe(-2315);
      expect(reader.readUint32().unwrap()).toBe(4109628145);
      expect(reader.readUint16().unwrap()).toBe(61679);
      expect(reader.readInt32().unwrap()).toBe(-286397205);
      expect(reader.readInt64().unwrap()).toBe(-0x15161718191a1b1dn);
      expect(reader.readUint64().unwrap()).toBe(0xe2e1e0dfdedddcdbn);
      expect(reader.readFloat32().unwrap()).toBe(-14276823 * 2 ** 31);
      expect(reader.readFloat64().unwrap()).toBe(-0x15d4d3d2d1d0cf * 2 ** 314);
      expect(Array.from(reader.readBytes(2).unwrap())).toEqual([206, 205]);
      expect(reader.readText(3).unwrap()).toBe('\u00cc\u00cb\u00ca');
      expect(reader.position).toBe(54);
    });

    it('reads signed and unsigned bytes', () => {
      const reader = new ByteReader(Uint8Array.of(0x80, 0x80, 0x7f));

      expect(reader.readInt8().unwrap()).toBe(-128);
      expect(reader.readUint8().unwrap()).toBe(128);
      expect(reader.readInt8().unwrap()).toBe(127);
    });

    it('treats even bytes as true', () => {
      const reader = new ByteReader(Uint8Array.of(0, 1, 2, 0xff));

      expect(reader.readBool().unwrap()).toBe(true);
      expect(reader.readBool().unwrap()).toBe(false);
      expect(reader.readBool().unwrap()).toBe(true);
      expect(reader.readBool().unwrap()).toBe(false);
    });

    it('decodes IEEE-754 bit patterns', () => {
      const reader = new ByteReader(
        Uint8Array.of(0x3f, 0x80, 0x00, 0x00, 0x7f, 0xc0, 0x00, 0x00)
      );

      expect(reader.readFloat32().unwrap()).toBe(1);
      expect(reader.readFloat32().unwrap()).toBeNaN();
    });
  });

  describe('byte runs and text', () => {
    it('keeps every byte of text unchanged', () => {
      const reader = new ByteReader(Uint8Array.of(0x68, 0x69, 0x00, 0xff));
      const text = reader.readText(4).unwrap();

      expect(text).toBe('hi\u0000\u00ff');
      expect(text.length).toBe(4);
    });

    it('returns copies that do not alias the buffer', () => {
      const source = Uint8Array.of(1, 2, 3);
      const reader = new ByteReader(source);
      source[0] = 99;

      const bytes = reader.readBytes(3).unwrap();
      bytes[1] = 42;
      reader.rewind();

      expect(Array.from(reader.readBytes(3).unwrap())).toEqual([1, 2, 3]);
    });

    it('allows zero-length reads anywhere, including at the end', () => {
      const reader = new ByteReader(Uint8Array.of(7));
      reader.readByte();

      expect(reader.readBytes(0).unwrap()).toEqual(new Uint8Array());
      expect(reader.readText(0).unwrap()).toBe('');
      expect(reader.position).toBe(1);
    });
  });

  describe('cursor', () => {
    it('tracks length, position and remaining', () => {
      const reader = new ByteReader(new Uint8Array(10));
      reader.readUint32();

      expect(reader.length).toBe(10);
      expect(reader.position).toBe(4);
      expect(reader.remaining).toBe(6);
    });

    it('rewinds to the start', () => {
      const reader = new ByteReader(Uint8Array.of(5, 6));
      reader.readUint16();
      reader.rewind();

      expect(reader.position).toBe(0);
      expect(reader.readByte().unwrap()).toBe(5);
    });
  });

  describe('failures', () => {
    it('fails when fewer bytes remain than requested, without moving', () => {
      const reader = new ByteReader(Uint8Array.of(1, 2, 3));
      reader.readByte();

      const result = reader.readUint32();
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(EndOfStreamError);
        expect(result.error.errorCode).toBe(ErrorCode.END_OF_STREAM);
        expect(result.error.context).toEqual({
          requested: 4,
          position: 1,
          length: 3,
        });
      }
      expect(reader.position).toBe(1);
      expect(reader.readUint16().unwrap()).toBe(0x0203);
    });

    it('fails every accessor once exhausted', () => {
      const reader = new ByteReader(new Uint8Array());
      const reads: Result<unknown, ReadError>[] = [
        reader.readByte(),
        reader.readBool(),
        reader.readInt8(),
        reader.readUint8(),
        reader.readInt16(),
        reader.readUint16(),
        reader.readInt32(),
        reader.readUint32(),
        reader.readInt64(),
        reader.readUint64(),
        reader.readFloat32(),
        reader.readFloat64(),
        reader.readBytes(1),
        reader.readText(1),
      ];

      for (const result of reads) {
        expect(result.isErr()).toBe(true);
      }
    });

    it('rejects negative and fractional lengths', () => {
      const reader = new ByteReader(new Uint8Array(4));

      for (const count of [-1, 1.5, Number.NaN]) {
        const result = reader.readBytes(count);
        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toBeInstanceOf(InvalidRequestError);
        }
      }
      expect(reader.position).toBe(0);
    });
  });
});
