import { NumberAndTotal } from '../metadata';
import { readAscii } from '../codecs/binary';
import genres from './id3v1-genres.json';

/**
 * Text encodings used by ID3v2 frames
 */
export const ID3_TEXT_ENCODING = {
  LATIN1: 0,
  /** UTF-16 with byte order mark */
  UTF16: 1,
  UTF16BE: 2,
  UTF8: 3,
} as const;

const utf8Decoder = new TextDecoder('utf-8');
const utf16Decoder = new TextDecoder('utf-16le');

function swapBytes(bytes: Uint8Array): Uint8Array {
  const swapped = new Uint8Array(bytes.length - (bytes.length % 2));
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    swapped[i] = bytes[i + 1];
    swapped[i + 1] = bytes[i];
  }
  return swapped;
}

export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Decode text in one of the four ID3v2 encodings. Trailing NUL characters are removed.
 * @param encoding Encoding byte of the frame
 * @param bytes The encoded text
 * @returns The text
 */
export function decodeText(encoding: number, bytes: Uint8Array): string {
  let text: string;
  switch (encoding) {
    case ID3_TEXT_ENCODING.UTF16: {
      if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
        text = utf16Decoder.decode(swapBytes(bytes.subarray(2)));
      } else if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
        text = utf16Decoder.decode(bytes.subarray(2));
      } else {
        text = utf16Decoder.decode(bytes);
      }
      break;
    }
    case ID3_TEXT_ENCODING.UTF16BE: {
      text = utf16Decoder.decode(swapBytes(bytes));
      break;
    }
    case ID3_TEXT_ENCODING.UTF8: {
      text = utf8Decoder.decode(bytes);
      break;
    }
    default: {
      text = readAscii(bytes);
    }
  }
  return text.replace(/\0+$/, '');
}

/**
 * Split at the first string terminator of the encoding, one zero byte for single byte encodings
 * and two aligned zero bytes for UTF-16.
 * @param encoding Encoding byte of the frame
 * @param bytes Bytes starting with a terminated string
 * @returns The string bytes without terminator, and everything after the terminator
 */
export function splitTerminated(encoding: number, bytes: Uint8Array): [Uint8Array, Uint8Array] {
  const wide = encoding === ID3_TEXT_ENCODING.UTF16 || encoding === ID3_TEXT_ENCODING.UTF16BE;
  const step = wide ? 2 : 1;
  for (let i = 0; i + step <= bytes.length; i += step) {
    if (bytes[i] === 0 && (!wide || bytes[i + 1] === 0)) {
      return [bytes.subarray(0, i), bytes.subarray(i + step)];
    }
  }
  return [bytes, new Uint8Array(0)];
}

/**
 * Parse "3" or "3/12"
 * @param text The text
 * @returns Current number and total, 0 for whatever is missing
 */
export function parseNumberAndTotal(text: string): NumberAndTotal {
  const [current, total] = text.split('/');
  return {
    current: Number.parseInt(current, 10) || 0,
    total: total === undefined ? 0 : Number.parseInt(total, 10) || 0,
  };
}

/**
 * Take the year from the start of a date like "2004" or "2004-06-30T12:00"
 * @param text The date
 * @returns The year, or undefined if the text doesn't start with 4 digits
 */
export function parseYear(text: string): number | undefined {
  const match = /^\s*(\d{4})/.exec(text);
  return match ? Number(match[1]) : undefined;
}

/**
 * Look up a genre of the ID3v1 genre list, which MP4 and ID3v2 refer to as well
 * @param index Index into the list
 * @returns The genre name, or undefined if the index is out of range
 */
export function id3v1Genre(index: number): string | undefined {
  return genres[index];
}

/**
 * Resolve ID3v2 genre references: "(13)", "(13)Pop", "13", "(RX)" and "(CR)"
 * @param text Content of a TCON frame
 * @returns The genre as text
 */
export function resolveGenre(text: string): string {
  const reference = /^\((\d+|RX|CR)\)(.*)$/.exec(text);
  if (reference) {
    const [, id, refinement] = reference;
    if (refinement) {
      return refinement;
    }
    if (id === 'RX') {
      return 'Remix';
    }
    if (id === 'CR') {
      return 'Cover';
    }
    return id3v1Genre(Number(id)) ?? text;
  }
  if (/^\d+$/.test(text)) {
    return id3v1Genre(Number(text)) ?? text;
  }
  return text;
}
