import { NumberAndTotal, Picture, TagFields } from '../metadata';
import { BufferStream, StreamReader } from '../stream';
import { decodeUtf8, parseNumberAndTotal, parseYear } from './text';

/**
 * Decode a FLAC PICTURE block, also found base64 encoded in METADATA_BLOCK_PICTURE comments
 * @param reader Reader positioned at the start of the block payload
 * @returns The picture
 */
export async function decodeFlacPicture(reader: StreamReader): Promise<Picture> {
  const type = await reader.readUInt32BE();
  const mimeType = await reader.readString(await reader.readUInt32BE());
  const description = decodeUtf8(await reader.readBytes(await reader.readUInt32BE()));
  // width, height, colour depth, number of indexed colours
  await reader.skip(16);
  const data = (await reader.readBytes(await reader.readUInt32BE())).slice();
  return { mimeType, type, description, data };
}

function withTotal(value: NumberAndTotal | undefined, total: string): NumberAndTotal {
  return { current: value?.current ?? 0, total: Number.parseInt(total, 10) || 0 };
}

/**
 * Decode a Vorbis comment header: vendor string followed by a list of "KEY=value" entries.
 * Used by FLAC VORBIS_COMMENT blocks and by the comment packets of Vorbis and Opus streams.
 * Keys are case insensitive; the first value wins for the conventional fields, all values are kept in `raw`.
 * @param reader Reader positioned after any packet type prefix
 * @returns The decoded fields
 */
export async function decodeVorbisComment(reader: StreamReader): Promise<TagFields> {
  const fields: TagFields = { format: 'VORBIS', raw: {} };
  const vendor = decodeUtf8(await reader.readBytes(await reader.readUInt32LE()));
  fields.raw.vendor = vendor;

  const count = await reader.readUInt32LE();
  const comments = new Map<string, string[]>();
  let trackTotal: string | undefined;
  let discTotal: string | undefined;
  for (let i = 0; i < count; i++) {
    const comment = decodeUtf8(await reader.readBytes(await reader.readUInt32LE()));
    const separator = comment.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const key = comment.slice(0, separator).toUpperCase();
    const value = comment.slice(separator + 1);

    const values = comments.get(key);
    if (values) {
      values.push(value);
      if (key !== 'METADATA_BLOCK_PICTURE') {
        continue;
      }
    } else {
      comments.set(key, [value]);
    }

    switch (key) {
      case 'TITLE': {
        fields.title = value;
        break;
      }
      case 'ALBUM': {
        fields.album = value;
        break;
      }
      case 'ARTIST': {
        fields.artist = value;
        break;
      }
      case 'ALBUMARTIST':
      case 'ALBUM ARTIST': {
        fields.albumArtist ??= value;
        break;
      }
      case 'COMPOSER': {
        fields.composer = value;
        break;
      }
      case 'GENRE': {
        fields.genre = value;
        break;
      }
      case 'COMMENT':
      case 'DESCRIPTION': {
        fields.comment ??= value;
        break;
      }
      case 'LYRICS': {
        fields.lyrics = value;
        break;
      }
      case 'DATE':
      case 'YEAR': {
        fields.year ??= parseYear(value);
        break;
      }
      case 'TRACKNUMBER': {
        fields.track = parseNumberAndTotal(value);
        break;
      }
      case 'TRACKTOTAL':
      case 'TOTALTRACKS': {
        trackTotal ??= value;
        break;
      }
      case 'DISCNUMBER': {
        fields.disc = parseNumberAndTotal(value);
        break;
      }
      case 'DISCTOTAL':
      case 'TOTALDISCS': {
        discTotal ??= value;
        break;
      }
      case 'METADATA_BLOCK_PICTURE': {
        const picture = await decodeFlacPicture(new StreamReader(new BufferStream(new Uint8Array(Buffer.from(value, 'base64')))));
        if (!fields.picture || picture.type === 3) {
          fields.picture = picture;
        }
        break;
      }
    }
  }

  for (const [key, values] of comments) {
    fields.raw[key.toLowerCase()] = values.length === 1 ? values[0] : values;
  }
  if (trackTotal !== undefined && !fields.track?.total) {
    fields.track = withTotal(fields.track, trackTotal);
  }
  if (discTotal !== undefined && !fields.disc?.total) {
    fields.disc = withTotal(fields.disc, discTotal);
  }
  return fields;
}
