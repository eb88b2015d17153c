import { TagFormat } from '../metadata';
import { FormatMismatchError, UnsupportedVersionError } from '../utils';
import { get7BitChunkedValue, readAscii } from './binary';

export const ID3V2_HEADER_SIZE = 10;
export const ID3V2_FOOTER_SIZE = 10;
export const ID3V1_SIZE = 128;

export type Id3v2Version = 2 | 3 | 4;

export interface Id3v2Header {
  version: Id3v2Version;
  revision: number;
  unsynchronisation: boolean;
  extendedHeader: boolean;
  experimental: boolean;
  footerPresent: boolean;
  /**
   * Size of everything after the header, excluding the footer
   */
  size: number;
}

/**
 * Map the major version byte that follows "ID3" to the tag format
 * @param version Major version byte
 * @returns The tag format
 * @throws UnsupportedVersionError for anything other than 2, 3 or 4
 */
export function toId3v2Format(version: number): Extract<TagFormat, 'ID3v2.2' | 'ID3v2.3' | 'ID3v2.4'> {
  switch (version) {
    case 2: {
      return 'ID3v2.2';
    }
    case 3: {
      return 'ID3v2.3';
    }
    case 4: {
      return 'ID3v2.4';
    }
    default: {
      throw new UnsupportedVersionError(`ID3 version: ${version}, expected: 2, 3 or 4`);
    }
  }
}

/**
 * Parse the 10-byte ID3v2 tag header
 * @param bytes The header bytes
 * @returns The header
 */
export function parseId3v2Header(bytes: Uint8Array): Id3v2Header {
  if (bytes.length < ID3V2_HEADER_SIZE || readAscii(bytes, 0, 3) !== 'ID3') {
    throw new FormatMismatchError('Expected ID3v2 tag header');
  }
  const version = bytes[3];
  toId3v2Format(version);
  const flags = bytes[5];
  return {
    version: version === 2 ? 2 : version === 3 ? 3 : 4,
    revision: bytes[4],
    unsynchronisation: (flags & 0x80) !== 0,
    extendedHeader: (flags & 0x40) !== 0,
    experimental: (flags & 0x20) !== 0,
    // Footers only exist since v2.4
    footerPresent: version === 4 && (flags & 0x10) !== 0,
    size: get7BitChunkedValue(bytes.subarray(6, 10)),
  };
}

/**
 * Number of bytes the whole tag occupies in the file
 * @param header The tag header
 * @returns Header, body and footer size
 */
export function id3v2TotalSize(header: Id3v2Header): number {
  return ID3V2_HEADER_SIZE + header.size + (header.footerPresent ? ID3V2_FOOTER_SIZE : 0);
}
