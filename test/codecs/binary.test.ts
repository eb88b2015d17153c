import { describe, expect, it } from '@jest/globals';

import {
  cutBits,
  get7BitChunkedValue,
  getChunkedValue,
  readAscii,
  readUInt16LE,
  readUInt24BE,
  readUInt32BE,
  readUInt32LE,
  readUInt64LE,
  startsWithAscii,
} from '../../src/codecs/binary';
import { InvalidArgumentError } from '../../src/utils';
import { writeBits } from '../test-utils';

describe('cutBits', () => {
  it('should cut bits within a single byte', () => {
    expect(cutBits(new Uint8Array([0b1010_1100]), 2, 3)).toBe(0b101n);
  });

  it('should cut bits that span byte boundaries', () => {
    expect(cutBits(new Uint8Array([0x12, 0x34, 0x56]), 4, 16)).toBe(0x2345n);
  });

  it('should cut 64 aligned bits', () => {
    expect(cutBits(new Uint8Array(8).fill(0xff), 0, 64)).toBe(0xffff_ffff_ffff_ffffn);
  });

  it('should read back what was written at odd offsets', () => {
    const buffer = new Uint8Array(8);
    writeBits(buffer, 5, 36, 0x9_8765_4321n);
    writeBits(buffer, 41, 20, 44_100n);
    expect(cutBits(buffer, 5, 36)).toBe(0x9_8765_4321n);
    expect(cutBits(buffer, 41, 20)).toBe(44_100n);
  });

  it('should read back every width at every alignment', () => {
    for (let width = 1; width <= 64; width++) {
      // alternating bits with both ends set
      const value = (0x5555_5555_5555_5555n & ((1n << BigInt(width)) - 1n)) | 1n | (1n << BigInt(width - 1));
      for (let offset = 0; offset < 8; offset++) {
        const buffer = new Uint8Array(10).fill(0xa5);
        writeBits(buffer, offset, width, value);
        expect(cutBits(buffer, offset, width)).toBe(value);
      }
    }
  });

  it('should reject widths above 64 bits', () => {
    expect(() => cutBits(new Uint8Array(16), 0, 65)).toThrow(InvalidArgumentError);
  });

  it('should reject ranges beyond the buffer', () => {
    expect(() => cutBits(new Uint8Array(2), 10, 8)).toThrow(InvalidArgumentError);
  });
});

describe('chunked values', () => {
  it('should decode synchsafe integers', () => {
    expect(get7BitChunkedValue(new Uint8Array([0x00, 0x00, 0x02, 0x01]))).toBe(257);
    // the high bit of every byte is ignored
    expect(get7BitChunkedValue(new Uint8Array([0x80, 0xff]))).toBe(127);
  });

  it('should decode base 256 integers', () => {
    expect(getChunkedValue(new Uint8Array([0x01, 0x00]))).toBe(256);
    expect(getChunkedValue(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff]))).toBe(2 ** 40 - 1);
  });
});

describe('fixed width readers', () => {
  it('should read little and big endian values', () => {
    const data = new Uint8Array([0x78, 0x56, 0x34, 0x12]);
    expect(readUInt16LE(data, 0)).toBe(0x5678);
    expect(readUInt32LE(data, 0)).toBe(0x1234_5678);
    expect(readUInt24BE(data, 1)).toBe(0x56_3412);
    expect(readUInt32BE(data, 0)).toBe(0x7856_3412);
  });

  it('should read unsigned values with the high bit set', () => {
    expect(readUInt32LE(new Uint8Array([0, 0, 0, 0x80]), 0)).toBe(0x8000_0000);
    expect(readUInt64LE(new Uint8Array(8).fill(0xff), 0)).toBe(0xffff_ffff_ffff_ffffn);
  });

  it('should reject reads beyond the buffer', () => {
    expect(() => readUInt16LE(new Uint8Array(3), 2)).toThrow(InvalidArgumentError);
    expect(() => readUInt64LE(new Uint8Array(7), 0)).toThrow(InvalidArgumentError);
  });
});

describe('ASCII helpers', () => {
  it('should read and compare ASCII', () => {
    const data = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0x57, 0x41, 0x56, 0x45]);
    expect(readAscii(data)).toBe('RIFFWAVE');
    expect(readAscii(data, 4, 4)).toBe('WAVE');
    expect(startsWithAscii(data, 'WAVE', 4)).toBe(true);
    expect(startsWithAscii(data, 'WAVEX', 4)).toBe(false);
    expect(startsWithAscii(data, 'RIFX')).toBe(false);
  });
});
