import { get7BitChunkedValue, readAscii, readUInt24BE, readUInt32BE } from '../codecs/binary';
import { ID3V2_FOOTER_SIZE, ID3V2_HEADER_SIZE, Id3v2Header, id3v2TotalSize, parseId3v2Header, toId3v2Format } from '../codecs/id3';
import { Picture, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { FormatMismatchError } from '../utils';
import { decodeText, parseNumberAndTotal, parseYear, resolveGenre, splitTerminated } from './text';

/**
 * v2.2 frame identifiers and their v2.3/v2.4 equivalents
 */
const V22_FRAME_IDS: Record<string, string> = {
  TT2: 'TIT2',
  TP1: 'TPE1',
  TP2: 'TPE2',
  TAL: 'TALB',
  TCM: 'TCOM',
  TCO: 'TCON',
  TYE: 'TYER',
  TRK: 'TRCK',
  TPA: 'TPOS',
  COM: 'COMM',
  ULT: 'USLT',
  PIC: 'APIC',
  TXX: 'TXXX',
};

const V22_IMAGE_FORMATS: Record<string, string> = {
  JPG: 'image/jpeg',
  PNG: 'image/png',
  GIF: 'image/gif',
  BMP: 'image/bmp',
};

interface Id3v2Frame {
  id: string;
  data: Uint8Array;
}

/**
 * Reverse the unsynchronisation scheme: every 0xFF 0x00 becomes 0xFF
 * @param bytes Unsynchronised bytes
 * @returns The original bytes
 */
export function removeUnsynchronisation(bytes: Uint8Array): Uint8Array {
  const result = new Uint8Array(bytes.length);
  let length = 0;
  for (let i = 0; i < bytes.length; i++) {
    result[length++] = bytes[i];
    if (bytes[i] === 0xff && bytes[i + 1] === 0x00) {
      i++;
    }
  }
  return result.subarray(0, length);
}

function framesStart(header: Id3v2Header, body: Uint8Array): number {
  if (!header.extendedHeader) {
    return 0;
  }
  // v2.3 extended header size excludes its own size field, v2.4 includes it and is synchsafe
  return header.version === 3 ? 4 + readUInt32BE(body, 0) : get7BitChunkedValue(body.subarray(0, 4));
}

function* iterateFrames(header: Id3v2Header, body: Uint8Array, raw: TagFields['raw']): Generator<Id3v2Frame> {
  const v22 = header.version === 2;
  const frameHeaderSize = v22 ? 6 : 10;
  let offset = framesStart(header, body);

  while (offset + frameHeaderSize <= body.length) {
    if (body[offset] === 0) {
      // padding
      break;
    }
    const id = readAscii(body, offset, v22 ? 3 : 4);
    const size = v22
      ? readUInt24BE(body, offset + 3)
      : header.version === 4
        ? get7BitChunkedValue(body.subarray(offset + 4, offset + 8))
        : readUInt32BE(body, offset + 4);
    const dataStart = offset + frameHeaderSize;
    if (dataStart + size > body.length) {
      throw new FormatMismatchError(`ID3v2 frame ${id} of ${size} bytes exceeds the tag at offset ${offset}`);
    }
    let data = body.subarray(dataStart, dataStart + size);
    offset = dataStart + size;

    if (v22) {
      yield { id: V22_FRAME_IDS[id] ?? id, data };
      continue;
    }

    const format = body[dataStart - 1];
    if (header.version === 3) {
      const compressed = (format & 0x80) !== 0;
      const encrypted = (format & 0x40) !== 0;
      if (compressed || encrypted) {
        raw[id] = data.slice();
        continue;
      }
      if (format & 0x20) {
        // group identifier
        data = data.subarray(1);
      }
    } else {
      const compressed = (format & 0x08) !== 0;
      const encrypted = (format & 0x04) !== 0;
      if (compressed || encrypted) {
        raw[id] = data.slice();
        continue;
      }
      if (format & 0x40) {
        data = data.subarray(1);
      }
      if (format & 0x01) {
        // data length indicator
        data = data.subarray(4);
      }
      if (format & 0x02) {
        data = removeUnsynchronisation(data);
      }
    }
    yield { id, data };
  }
}

function decodeCommentLike(data: Uint8Array): { description: string; text: string } {
  const encoding = data[0];
  // 3 bytes of language follow the encoding byte
  const [description, text] = splitTerminated(encoding, data.subarray(4));
  return { description: decodeText(encoding, description), text: decodeText(encoding, text) };
}

function decodePicture(id: string, data: Uint8Array, v22: boolean): Picture {
  const encoding = data[0];
  let mimeType: string;
  let rest: Uint8Array;
  if (v22) {
    const imageFormat = readAscii(data, 1, 3);
    mimeType = V22_IMAGE_FORMATS[imageFormat.toUpperCase()] ?? `image/${imageFormat.toLowerCase()}`;
    rest = data.subarray(4);
  } else {
    const [mime, afterMime] = splitTerminated(0, data.subarray(1));
    mimeType = readAscii(mime);
    rest = afterMime;
  }
  if (rest.length === 0) {
    throw new FormatMismatchError(`ID3v2 frame ${id} is truncated`);
  }
  const type = rest[0];
  const [description, picture] = splitTerminated(encoding, rest.subarray(1));
  return {
    mimeType,
    type,
    description: decodeText(encoding, description),
    data: picture.slice(),
  };
}

/**
 * Decode an ID3v2.2, v2.3 or v2.4 tag.
 * The reader must be positioned at the "ID3" marker, and is left right after the tag (and its footer).
 * @param reader Reader positioned at the tag
 * @returns The decoded fields, with `format` set to the tag version
 */
export async function decodeId3v2Tags(reader: StreamReader): Promise<TagFields> {
  const header = parseId3v2Header(await reader.readBytes(ID3V2_HEADER_SIZE));
  const fields: TagFields = { format: toId3v2Format(header.version), raw: {} };

  let body = await reader.readBytes(header.size);
  if (header.footerPresent) {
    await reader.skip(ID3V2_FOOTER_SIZE);
  }
  if (header.version === 2 && header.extendedHeader) {
    // in v2.2 this flag means the whole tag is compressed, and no compression scheme was ever defined
    return fields;
  }
  if (header.unsynchronisation && header.version < 4) {
    body = removeUnsynchronisation(body);
  }

  for (const { id, data } of iterateFrames(header, body, fields.raw)) {
    if (data.length === 0) {
      continue;
    }
    if (id === 'TXXX') {
      const [description, value] = splitTerminated(data[0], data.subarray(1));
      fields.raw[`TXXX:${decodeText(data[0], description)}`] = decodeText(data[0], value);
      continue;
    }
    if (id.startsWith('T')) {
      const text = decodeText(data[0], data.subarray(1));
      fields.raw[id] = text;
      switch (id) {
        case 'TIT2': {
          fields.title = text;
          break;
        }
        case 'TALB': {
          fields.album = text;
          break;
        }
        case 'TPE1': {
          fields.artist = text;
          break;
        }
        case 'TPE2': {
          fields.albumArtist = text;
          break;
        }
        case 'TCOM': {
          fields.composer = text;
          break;
        }
        case 'TCON': {
          fields.genre = resolveGenre(text);
          break;
        }
        case 'TYER':
        case 'TDRC': {
          fields.year = parseYear(text) ?? fields.year;
          break;
        }
        case 'TRCK': {
          fields.track = parseNumberAndTotal(text);
          break;
        }
        case 'TPOS': {
          fields.disc = parseNumberAndTotal(text);
          break;
        }
      }
      continue;
    }
    switch (id) {
      case 'COMM': {
        const { description, text } = decodeCommentLike(data);
        fields.raw[description ? `COMM:${description}` : 'COMM'] = text;
        if (fields.comment === undefined || !description) {
          fields.comment = text;
        }
        break;
      }
      case 'USLT': {
        const { text } = decodeCommentLike(data);
        fields.raw.USLT = text;
        fields.lyrics = text;
        break;
      }
      case 'APIC': {
        const picture = decodePicture(id, data, header.version === 2);
        // the front cover wins over whatever came first
        if (!fields.picture || picture.type === 3) {
          fields.picture = picture;
        }
        break;
      }
      default: {
        fields.raw[id] = data.slice();
      }
    }
  }

  return fields;
}

/**
 * Number of bytes an ID3v2 tag occupies, from its header
 * @param reader Reader positioned at the tag, the cursor is not moved
 * @returns The size including header and footer
 */
export async function peekId3v2Size(reader: StreamReader): Promise<number> {
  return id3v2TotalSize(parseId3v2Header(await reader.peek(ID3V2_HEADER_SIZE)));
}
