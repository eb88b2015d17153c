import { readUInt32LE } from '../codecs/binary';
import { createMetadata, DsfMetadata, emptyTagFields, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { peekId3v2Size } from '../tags/id3v2';
import { FormatMismatchError, ResolvedReadMetadataOptions } from '../utils';

/**
 * Parses the header of a DSF (DSD stream file) and the ID3v2 tag its metadata pointer refers to.
 *
 * Layout: "DSD " chunk (marker, chunk size, file size, metadata pointer) followed by
 * the "fmt " chunk, whose sample rate and sample count give the duration.
 *
 * @param reader Reader positioned anywhere, the stream must start with "DSD "
 * @param options Resolved options
 * @returns The metadata, duration is truncated to whole seconds
 * @throws FormatMismatchError if the "DSD " marker is missing
 */
export async function readDsf(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<DsfMetadata> {
  await reader.seek(0);
  const marker = await reader.readString(4);
  if (marker !== 'DSD ') {
    throw new FormatMismatchError(`Expected 'DSD ' but found '${marker}'`);
  }

  // chunk size and file size
  await reader.skip(16);
  const tagPointer = await reader.readUInt64LE();
  // "fmt " marker, chunk size, format version, format id, channel type, channel count
  const fmt = await reader.readBytes(28);
  const channels = readUInt32LE(fmt, 24);
  const sampleRate = await reader.readUInt32LE();
  const bitsPerSample = await reader.readUInt32LE();
  const sampleCount = await reader.readUInt64LE();

  const duration = sampleRate > 0 ? Number(sampleCount / BigInt(sampleRate)) : 0;

  let tags: TagFields = emptyTagFields();
  // a zero pointer means the file has no metadata chunk
  if (tagPointer > 0n) {
    await reader.seek(Number(tagPointer));
    tags = await options.decoders.id3v2(await reader.subReader(await peekId3v2Size(reader)));
  }

  return createMetadata(
    { container: 'DSF', fileType: 'DSF' },
    {
      format: tags.format ?? 'UnknownFormat',
      tags,
      durationInSeconds: duration,
      raw: {
        sample_rate: sampleRate,
        channels,
        bits_per_sample: bitsPerSample,
        sample_count: sampleCount,
      },
    },
  );
}
