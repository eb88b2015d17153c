import { ID3V1_SIZE } from '../codecs/id3';
import { computeMp3Duration, hasFrameSync, parseMpegFrameHeader } from '../codecs/mp3';
import { createMetadata, emptyTagFields, Mp3Metadata, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { FormatMismatchError, ResolvedReadMetadataOptions } from '../utils';
import { peekId3v2Size } from '../tags/id3v2';

const MPEG_HEADER_SIZE = 4;

function toMetadata(tags: TagFields, header: Uint8Array, strippedSize: number): Mp3Metadata {
  const frame = parseMpegFrameHeader(header);
  return createMetadata(
    { container: 'MP3', fileType: 'MP3' },
    {
      format: tags.format ?? 'UnknownFormat',
      tags,
      durationInSeconds: computeMp3Duration(header, strippedSize),
      raw: {
        sample_rate: frame.sampleRate,
        bitrate: frame.bitrate,
        version: frame.version,
        layer: frame.layer,
        frame_size: frame.frameSize,
      },
    },
  );
}

/**
 * Read an MP3 file that starts with an ID3v2 tag.
 * The first frame header right after the tag is taken as representative of the whole stream.
 *
 * @param reader Reader positioned at the start of the stream
 * @param size Total size of the stream in bytes
 * @param options Resolved options
 * @returns The metadata, duration is in whole seconds
 */
export async function readMp3WithId3v2(reader: StreamReader, size: number, options: ResolvedReadMetadataOptions): Promise<Mp3Metadata> {
  await reader.seek(0);
  const tagSize = await peekId3v2Size(reader);
  const tags = await options.decoders.id3v2(await reader.subReader(tagSize));

  await reader.seek(tagSize);
  const header = await reader.readBytes(MPEG_HEADER_SIZE);
  return toMetadata(tags, header, size - tagSize);
}

/**
 * Read an MP3 file that ends with an ID3v1 tag
 *
 * @param reader Reader positioned anywhere
 * @param size Total size of the stream in bytes
 * @param options Resolved options
 * @returns The metadata, duration is in whole seconds
 */
export async function readMp3WithId3v1(reader: StreamReader, size: number, options: ResolvedReadMetadataOptions): Promise<Mp3Metadata> {
  await reader.seek(size - ID3V1_SIZE);
  const tags = await options.decoders.id3v1(await reader.subReader(ID3V1_SIZE));

  await reader.seek(0);
  const header = await reader.readBytes(MPEG_HEADER_SIZE);
  return toMetadata(tags, header, size - ID3V1_SIZE);
}

/**
 * Read an MP3 file without any tag. It has to start with a frame.
 *
 * @param reader Reader positioned anywhere
 * @param size Total size of the stream in bytes
 * @returns The metadata, duration is in whole seconds
 * @throws FormatMismatchError if the stream doesn't start with the frame sync
 */
export async function readUntaggedMp3(reader: StreamReader, size: number): Promise<Mp3Metadata> {
  await reader.seek(0);
  const header = await reader.readBytes(MPEG_HEADER_SIZE);
  if (!hasFrameSync(header)) {
    throw new FormatMismatchError('Expected MPEG frame sync at the start of the stream');
  }
  return toMetadata(emptyTagFields(), header, size);
}
