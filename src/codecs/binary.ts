/**
 * Binary data reading utilities
 *
 * This module provides reusable functions for reading binary data
 * in little-endian and big-endian formats, and bit spans.
 */

import { InvalidArgumentError } from '../utils';

function ensureAvailable(buffer: Uint8Array, offset: number, length: number, what: string): void {
  if (offset < 0 || offset + length > buffer.length) {
    throw new InvalidArgumentError(`Insufficient data for reading ${what} at offset ${offset} from a buffer of size ${buffer.length}`);
  }
}

// ============================================================================
// Little-Endian Reading
// ============================================================================

/**
 * Read a 16-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint16 value
 */
export function readUInt16LE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 2, 'uint16');
  return buffer[offset] | (buffer[offset + 1] << 8);
}

/**
 * Read a 32-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint32 value
 */
export function readUInt32LE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 4, 'uint32');
  return (buffer[offset] | (buffer[offset + 1] << 8) | (buffer[offset + 2] << 16) | (buffer[offset + 3] << 24)) >>> 0;
}

/**
 * Read a 64-bit unsigned integer (little-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint64 value as bigint
 */
export function readUInt64LE(buffer: Uint8Array, offset: number): bigint {
  ensureAvailable(buffer, offset, 8, 'uint64');
  const low = readUInt32LE(buffer, offset);
  const high = readUInt32LE(buffer, offset + 4);
  return (BigInt(high) << 32n) + BigInt(low);
}

// ============================================================================
// Big-Endian Reading
// ============================================================================

/**
 * Read a 16-bit unsigned integer (big-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint16 value
 */
export function readUInt16BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 2, 'uint16');
  return (buffer[offset] << 8) | buffer[offset + 1];
}

/**
 * Read a 24-bit unsigned integer (big-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint24 value
 */
export function readUInt24BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 3, 'uint24');
  return (buffer[offset] << 16) | (buffer[offset + 1] << 8) | buffer[offset + 2];
}

/**
 * Read a 32-bit unsigned integer (big-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint32 value
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 4, 'uint32');
  return ((buffer[offset] << 24) | (buffer[offset + 1] << 16) | (buffer[offset + 2] << 8) | buffer[offset + 3]) >>> 0;
}

// ============================================================================
// Bits and multi-byte values
// ============================================================================

/**
 * Extract an unsigned value from an arbitrary, not necessarily byte aligned, span of bits.
 * Bits are numbered from the most significant bit of the first byte.
 *
 * @param buffer The buffer to read from
 * @param bitOffset Offset of the first bit
 * @param bitWidth Number of bits, at most 64
 * @returns The value
 * @throws InvalidArgumentError if the width exceeds 64 or the span exceeds the buffer
 *
 * @example
 * cutBits(new Uint8Array([0b1010_1100]), 2, 3) // 0b101n
 */
export function cutBits(buffer: Uint8Array, bitOffset: number, bitWidth: number): bigint {
  if (bitWidth > 64) {
    throw new InvalidArgumentError(`Bit width ${bitWidth} exceeds the maximum of 64`);
  }
  if (bitOffset < 0 || bitWidth < 0 || buffer.length * 8 < bitOffset + bitWidth) {
    throw new InvalidArgumentError(`Out of bounds read of ${bitWidth} bits at bit offset ${bitOffset} from a buffer of size ${buffer.length}`);
  }

  let result = 0n;
  let bitsRead = 0;

  const splitStart = bitOffset % 8;
  if (splitStart > 0) {
    const remaining = 8 - splitStart;
    const splitByte = BigInt(buffer[Math.floor(bitOffset / 8)] & ((1 << remaining) - 1));
    if (bitWidth <= remaining) {
      return splitByte >> BigInt(remaining - bitWidth);
    }
    bitsRead = remaining;
    result = splitByte;
  }

  const wholeBytes = Math.floor((bitWidth - bitsRead) / 8);
  const start = (bitOffset + bitsRead) / 8;
  for (let i = 0; i < wholeBytes; i++) {
    result = (result << 8n) | BigInt(buffer[start + i]);
    bitsRead += 8;
  }

  const remaining = bitWidth - bitsRead;
  if (remaining > 0) {
    result = (result << BigInt(remaining)) | BigInt(buffer[start + wholeBytes] >> (8 - remaining));
  }
  return result;
}

/**
 * Interpret bytes as a big-endian integer with 7 significant bits per byte (synchsafe integer)
 * @param bytes The bytes
 * @returns The value
 */
export function get7BitChunkedValue(bytes: Uint8Array): number {
  let n = 0;
  for (const b of bytes) {
    n = n * 128 + (b & 0x7f);
  }
  return n;
}

/**
 * Interpret bytes as a big-endian integer with 8 significant bits per byte
 * @param bytes The bytes
 * @returns The value
 */
export function getChunkedValue(bytes: Uint8Array): number {
  let n = 0;
  for (const b of bytes) {
    n = n * 256 + b;
  }
  return n;
}

/**
 * Read an ASCII (latin1) string from a Uint8Array
 * @param u8 The Uint8Array to read from
 * @param offset The offset to start reading from
 * @param length The number of bytes to read
 * @returns The string
 */
export function readAscii(u8: Uint8Array, offset = 0, length = u8.length - offset): string {
  let result = '';
  const end = Math.min(u8.length, offset + length);
  for (let i = offset; i < end; i++) {
    // eslint-disable-next-line unicorn/prefer-code-point
    result += String.fromCharCode(u8[i]);
  }
  return result;
}

/**
 * Check whether the bytes at the offset equal an ASCII string
 * @param u8 The bytes
 * @param text The expected string
 * @param offset Offset of the first byte to compare
 * @returns true if all bytes match
 */
export function startsWithAscii(u8: Uint8Array, text: string, offset = 0): boolean {
  if (offset + text.length > u8.length) {
    return false;
  }
  for (let i = 0; i < text.length; i++) {
    // eslint-disable-next-line unicorn/prefer-code-point
    if (u8[offset + i] !== text.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}
