import { cutBits } from '../codecs/binary';
import { createMetadata, FlacMetadata, mergeTagFields, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { FormatMismatchError, ResolvedReadMetadataOptions } from '../utils';

/**
 * FLAC metadata block types handled here.
 * Padding (1), application (2), seek table (3) and cue sheet (5) blocks are skipped.
 */
const BLOCK_TYPE = {
  STREAMINFO: 0,
  VORBIS_COMMENT: 4,
  PICTURE: 6,
} as const;

export interface FlacStreamInfo {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  totalSamples: number;
}

/**
 * Decode the fields of a STREAMINFO block payload
 * @param data The payload, at least 18 bytes
 * @returns The stream info
 */
export function parseStreamInfo(data: Uint8Array): FlacStreamInfo {
  return {
    sampleRate: Number(cutBits(data, 80, 20)),
    channels: Number(cutBits(data, 100, 3)) + 1,
    bitsPerSample: Number(cutBits(data, 103, 5)) + 1,
    totalSamples: Number(cutBits(data, 108, 36)),
  };
}

/**
 * Parses the metadata blocks of a FLAC stream, up to and including the block flagged as the last one.
 * Audio frames after the metadata blocks are never read.
 *
 * @param reader Reader positioned at the "fLaC" marker
 * @param options Resolved options
 * @returns The metadata
 * @throws FormatMismatchError if the "fLaC" marker is missing
 */
export async function readFlac(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<FlacMetadata> {
  const marker = await reader.readString(4);
  if (marker !== 'fLaC') {
    throw new FormatMismatchError(`Expected 'fLaC' but found '${marker}'`);
  }

  let streamInfo: FlacStreamInfo | undefined;
  let comments: TagFields = { raw: {} };
  const pictures: TagFields = { raw: {} };
  const blockTypes: number[] = [];

  let last = false;
  while (!last) {
    const header = await reader.readUInt8();
    last = (header & 0x80) !== 0;
    const type = header & 0x7f;
    const length = await reader.readUInt24BE();
    blockTypes.push(type);

    switch (type) {
      case BLOCK_TYPE.STREAMINFO: {
        streamInfo = parseStreamInfo(await reader.readBytes(length));
        break;
      }
      case BLOCK_TYPE.VORBIS_COMMENT: {
        comments = await options.decoders.vorbisComment(await reader.subReader(length));
        break;
      }
      case BLOCK_TYPE.PICTURE: {
        const picture = await options.decoders.flacPicture(await reader.subReader(length));
        if (!pictures.picture || picture.type === 3) {
          pictures.picture = picture;
        }
        break;
      }
      default: {
        await reader.skip(length);
      }
    }
  }

  const sampleRate = streamInfo?.sampleRate ?? 0;
  const totalSamples = streamInfo?.totalSamples ?? 0;

  return createMetadata(
    { container: 'FLAC', fileType: 'FLAC' },
    {
      format: 'VORBIS',
      // a PICTURE block takes precedence over a picture in the comments
      tags: mergeTagFields(comments, pictures),
      durationInSeconds: sampleRate > 0 ? totalSamples / sampleRate : 0,
      raw: {
        sample_rate: sampleRate,
        channels: streamInfo?.channels ?? 0,
        bits_per_sample: streamInfo?.bitsPerSample ?? 0,
        total_samples: totalSamples,
        block_types: blockTypes,
      },
    },
  );
}
