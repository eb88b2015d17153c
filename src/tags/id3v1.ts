import { readAscii } from '../codecs/binary';
import { ID3V1_SIZE } from '../codecs/id3';
import { TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { FormatMismatchError } from '../utils';
import { id3v1Genre, parseYear } from './text';

function field(bytes: Uint8Array, offset: number, length: number): string {
  return readAscii(bytes, offset, length).replace(/\0.*$/s, '').trimEnd();
}

/**
 * Decode an ID3v1 or ID3v1.1 tag (the 128-byte record that starts with "TAG").
 * In v1.1 the last two bytes of the comment hold a zero byte and the track number.
 * @param reader Reader positioned at the start of the record
 * @returns The decoded fields
 */
export async function decodeId3v1Tags(reader: StreamReader): Promise<TagFields> {
  const tag = await reader.readBytes(ID3V1_SIZE);
  if (readAscii(tag, 0, 3) !== 'TAG') {
    throw new FormatMismatchError("Expected ID3v1 marker 'TAG'");
  }

  const fields: TagFields = {
    format: 'ID3v1',
    title: field(tag, 3, 30),
    artist: field(tag, 33, 30),
    album: field(tag, 63, 30),
    year: parseYear(field(tag, 93, 4)),
    raw: {},
  };

  if (tag[125] === 0 && tag[126] !== 0) {
    fields.comment = field(tag, 97, 28);
    fields.track = { current: tag[126], total: 0 };
  } else {
    fields.comment = field(tag, 97, 30);
  }

  const genre = id3v1Genre(tag[127]);
  if (genre !== undefined) {
    fields.genre = genre;
  }
  fields.raw.genre_index = tag[127];

  return fields;
}
