import { createMetadata, emptyTagFields, TagFields, WavMetadata } from '../metadata';
import { StreamReader } from '../stream';
import { peekId3v2Size } from '../tags/id3v2';
import { EndOfStreamError, FormatMismatchError, ResolvedReadMetadataOptions, UnsupportedFormatError } from '../utils';

const WAVE_FORMAT_PCM = 1;
const FMT_CHUNK_MIN_SIZE = 16;

interface ChunkHeader {
  id: string;
  size: number;
}

interface WavFormat {
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

async function readRiffHeader(reader: StreamReader): Promise<void> {
  const riff = await reader.readString(4);
  if (riff !== 'RIFF') {
    throw new FormatMismatchError(`Chunk header '${riff}' does not match expected 'RIFF'`);
  }
  // RIFF size, not trusted
  await reader.skip(4);
  const wave = await reader.readString(4);
  if (wave !== 'WAVE') {
    throw new FormatMismatchError(`File type '${wave}' does not match expected 'WAVE'`);
  }
}

/**
 * Read the next chunk header
 * @param reader Reader positioned at a chunk
 * @returns The header, or undefined at the end of the stream
 */
async function readChunkHeader(reader: StreamReader): Promise<ChunkHeader | undefined> {
  let id: string;
  try {
    id = await reader.readString(4);
  } catch (error) {
    if (error instanceof EndOfStreamError) {
      return undefined;
    }
    throw error;
  }
  return { id, size: await reader.readUInt32LE() };
}

/**
 * Chunks are word aligned, a chunk with odd size is followed by a pad byte
 */
async function skipChunkPayload(reader: StreamReader, size: number): Promise<void> {
  await reader.skip(size + (size % 2));
}

async function readFmtChunk(reader: StreamReader, size: number): Promise<WavFormat> {
  if (size < FMT_CHUNK_MIN_SIZE) {
    throw new FormatMismatchError(`fmt chunk of ${size} bytes is shorter than ${FMT_CHUNK_MIN_SIZE} bytes`);
  }
  const audioFormat = await reader.readUInt16LE();
  const channels = await reader.readUInt16LE();
  const sampleRate = await reader.readUInt32LE();
  // byte rate and block align
  await reader.skip(6);
  const bitsPerSample = await reader.readUInt16LE();
  if (audioFormat !== WAVE_FORMAT_PCM) {
    throw new UnsupportedFormatError(`Unsupported audio format: ${audioFormat} (only PCM format 1 is supported)`);
  }
  // the remainder has the same parity as the chunk, so this also skips the pad byte
  await skipChunkPayload(reader, size - FMT_CHUNK_MIN_SIZE);
  return { channels, sampleRate, bitsPerSample };
}

/**
 * Parses a WAV file chunk by chunk until the end of the stream.
 * Only PCM is supported. Chunks other than "fmt ", "data" and embedded ID3v2 tags ("id3 " / "ID3 ") are skipped.
 * An ID3v2 tag appended after the chunks without a chunk header is decoded as well.
 *
 * @param reader Reader positioned at the "RIFF" marker
 * @param options Resolved options
 * @returns The metadata, with format "UnknownFormat" unless an ID3v2 chunk was found
 * @throws FormatMismatchError if the RIFF or WAVE markers are missing or the fmt chunk is too short
 * @throws UnsupportedFormatError if the audio is not PCM
 */
export async function readWav(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<WavMetadata> {
  await readRiffHeader(reader);

  let format: WavFormat | undefined;
  let dataSize = 0;
  let tags: TagFields = emptyTagFields();

  for (let chunk = await readChunkHeader(reader); chunk; chunk = await readChunkHeader(reader)) {
    switch (chunk.id) {
      case 'fmt ': {
        format = await readFmtChunk(reader, chunk.size);
        break;
      }
      case 'data': {
        dataSize = chunk.size;
        await skipChunkPayload(reader, chunk.size);
        break;
      }
      case 'id3 ':
      case 'ID3 ': {
        tags = await options.decoders.id3v2(await reader.subReader(chunk.size));
        if (chunk.size % 2) {
          await reader.skip(1);
        }
        break;
      }
      default: {
        if (chunk.id.startsWith('ID3')) {
          // an ID3v2 tag appended without a chunk header
          await reader.seek(reader.tell() - 8);
          tags = await options.decoders.id3v2(await reader.subReader(await peekId3v2Size(reader)));
        } else {
          await skipChunkPayload(reader, chunk.size);
        }
      }
    }
  }

  const sampleRate = format?.sampleRate ?? 0;
  const channels = format?.channels ?? 0;
  const bitsPerSample = format?.bitsPerSample ?? 0;
  const bytesPerSecond = sampleRate * channels * Math.ceil(bitsPerSample / 8);

  return createMetadata(
    { container: 'WAV', fileType: 'WAV' },
    {
      format: tags.format ?? 'UnknownFormat',
      tags,
      durationInSeconds: bytesPerSecond > 0 ? dataSize / bytesPerSecond : 0,
      raw: {
        sample_rate: sampleRate,
        bits_per_sample: bitsPerSample,
        channels,
        data_size: dataSize,
      },
    },
  );
}

/**
 * Walk the chunks of a WAV file up to the audio payload and move the cursor right after it,
 * where a trailing tag would begin.
 * @param reader Reader positioned at the "RIFF" marker
 * @returns The position after the data chunk and its pad byte
 * @throws EndOfStreamError if there is no data chunk
 */
export async function seekPastWavAudio(reader: StreamReader): Promise<number> {
  await readRiffHeader(reader);
  for (let chunk = await readChunkHeader(reader); chunk; chunk = await readChunkHeader(reader)) {
    await skipChunkPayload(reader, chunk.size);
    if (chunk.id === 'data') {
      return reader.tell();
    }
  }
  throw new EndOfStreamError('No data chunk found in WAV file');
}
