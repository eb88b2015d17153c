import { readAscii, readUInt16BE, readUInt32BE } from '../codecs/binary';
import { NumberAndTotal, Picture, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { FormatMismatchError } from '../utils';
import { decodeUtf8, id3v1Genre, parseYear } from './text';

/**
 * Well-known type indicators of the "data" atom
 */
const DATA_TYPE = {
  IMPLICIT: 0,
  UTF8: 1,
  JPEG: 13,
  PNG: 14,
  INTEGER: 21,
  BMP: 27,
} as const;

const PICTURE_MIME_TYPES: Record<number, string> = {
  [DATA_TYPE.JPEG]: 'image/jpeg',
  [DATA_TYPE.PNG]: 'image/png',
  [DATA_TYPE.BMP]: 'image/bmp',
};

interface DataAtom {
  type: number;
  value: Uint8Array;
}

export interface AtomHeader {
  type: string;
  /**
   * Size of the payload, without the header
   */
  size: number;
}

/**
 * Read the header of the atom at the cursor.
 * A size of 1 means a 64-bit size follows the type, a size of 0 means the atom extends to the end of the reader.
 * @param reader Reader positioned at an atom
 * @param end Position where the enclosing atom ends
 * @returns Type and payload size, the cursor is left at the payload
 */
export async function readAtomHeader(reader: StreamReader, end: number): Promise<AtomHeader> {
  const start = reader.tell();
  const header = await reader.readBytes(8);
  const type = readAscii(header, 4, 4);
  let size = readUInt32BE(header, 0);
  let headerSize = 8;
  let atomEnd = size === 0 ? end : start + size;
  if (size === 1) {
    const largeSize = await reader.readBytes(8);
    size = readUInt32BE(largeSize, 0) * 2 ** 32 + readUInt32BE(largeSize, 4);
    headerSize = 16;
    atomEnd = start + size;
  }
  if (atomEnd < start + headerSize || atomEnd > end) {
    throw new FormatMismatchError(`Atom ${type} at offset ${start} has invalid size ${size}`);
  }
  return { type, size: atomEnd - start - headerSize };
}

async function readDataAtoms(reader: StreamReader, size: number): Promise<DataAtom[]> {
  const end = reader.tell() + size;
  const atoms: DataAtom[] = [];
  while (reader.tell() + 8 <= end) {
    const { type, size: payloadSize } = await readAtomHeader(reader, end);
    if (type !== 'data' || payloadSize < 8) {
      await reader.skip(payloadSize);
      continue;
    }
    const payload = await reader.readBytes(payloadSize);
    // 1 byte version, 3 bytes type indicator, 4 bytes locale
    atoms.push({ type: readUInt32BE(payload, 0) & 0xffffff, value: payload.subarray(8) });
  }
  await reader.seek(end);
  return atoms;
}

function numberAndTotal(value: Uint8Array): NumberAndTotal {
  // 2 bytes of padding come first
  return {
    current: value.length >= 4 ? readUInt16BE(value, 2) : 0,
    total: value.length >= 6 ? readUInt16BE(value, 4) : 0,
  };
}

function picture(atom: DataAtom): Picture {
  return {
    mimeType: PICTURE_MIME_TYPES[atom.type] ?? 'application/octet-stream',
    // front cover
    type: 3,
    description: '',
    data: atom.value.slice(),
  };
}

/**
 * Decode the children of an "ilst" atom, the iTunes style metadata list.
 * @param reader Reader covering exactly the payload of the "ilst" atom
 * @returns The decoded fields
 */
export async function decodeMp4Atoms(reader: StreamReader): Promise<TagFields> {
  const fields: TagFields = { format: 'MP4', raw: {} };
  const end = await reader.size();

  while (reader.tell() + 8 <= end) {
    const { type, size } = await readAtomHeader(reader, end);
    if (type === '----') {
      // freeform atoms are not decoded
      await reader.skip(size);
      continue;
    }
    const [data] = await readDataAtoms(reader, size);
    if (!data) {
      continue;
    }
    const text = data.type === DATA_TYPE.UTF8 ? decodeUtf8(data.value) : undefined;
    if (text !== undefined) {
      fields.raw[type] = text;
    }

    switch (type) {
      case '©nam': {
        fields.title = text;
        break;
      }
      case '©ART': {
        fields.artist = text;
        break;
      }
      case '©alb': {
        fields.album = text;
        break;
      }
      case 'aART': {
        fields.albumArtist = text;
        break;
      }
      case '©wrt': {
        fields.composer = text;
        break;
      }
      case '©gen': {
        fields.genre = text;
        break;
      }
      case 'gnre': {
        // 1-based index into the ID3v1 genre list
        if (data.value.length >= 2) {
          fields.genre ??= id3v1Genre(readUInt16BE(data.value, 0) - 1);
        }
        break;
      }
      case '©day': {
        fields.year = text === undefined ? undefined : parseYear(text);
        break;
      }
      case '©cmt': {
        fields.comment = text;
        break;
      }
      case '©lyr': {
        fields.lyrics = text;
        break;
      }
      case 'trkn': {
        fields.track = numberAndTotal(data.value);
        break;
      }
      case 'disk': {
        fields.disc = numberAndTotal(data.value);
        break;
      }
      case 'covr': {
        fields.picture = picture(data);
        break;
      }
      default: {
        if (text === undefined) {
          fields.raw[type] = data.value.slice();
        }
      }
    }
  }

  return fields;
}
