import { Classification, Metadata } from './metadata';
import { FallbackChainReader } from './parsers/adapter';
import { readDsf } from './parsers/dsf';
import { readFlac } from './parsers/flac';
import { identify } from './parsers/identify';
import { readMp3WithId3v1, readMp3WithId3v2, readUntaggedMp3 } from './parsers/mp3';
import { readMp4 } from './parsers/mp4';
import { readOgg } from './parsers/ogg';
import { readWav } from './parsers/wav';
import { FileStream, SeekableStream, StreamReader } from './stream';
import { defaultTagDecoders } from './tags/decoders';
import {
  DEFAULT_MAX_UPFRONT_READ_BYTES,
  isUnsupportedFormatError,
  MetadataError,
  NoTagsFoundError,
  ReadMetadataOptions,
  ResolvedReadMetadataOptions,
  UnsupportedFormatError,
} from './utils';

/**
 * Fill in the defaults of options
 * @param optionsInput Options given by the caller
 * @returns Options with every field set
 */
export function resolveOptions(optionsInput?: ReadMetadataOptions): ResolvedReadMetadataOptions {
  const options = {
    quiet: true,
    maxUpfrontReadBytes: DEFAULT_MAX_UPFRONT_READ_BYTES,
    ...optionsInput,
  };
  return {
    quiet: options.quiet,
    maxUpfrontReadBytes: options.maxUpfrontReadBytes,
    decoders: { ...defaultTagDecoders, ...options.decoders },
  };
}

/**
 * Readers for streams in which identification found no tags at all
 */
const untaggedReader = new FallbackChainReader([
  { read: readDsf },
  { read: async (reader) => readUntaggedMp3(reader, await reader.size()) },
]);

/**
 * Read the metadata of an audio file: tags, duration and technical fields.
 * @param stream The input stream, must be seekable. The caller owns it and is responsible for closing it.
 * @param optionsInput Options
 * @returns The metadata
 */
export async function readMetadata(stream: SeekableStream, optionsInput?: ReadMetadataOptions): Promise<Metadata> {
  const options = resolveOptions(optionsInput);
  const reader = new StreamReader(stream, options.maxUpfrontReadBytes);
  await reader.seek(0);

  let classification: Classification;
  try {
    classification = await identify(reader);
  } catch (error) {
    if (error instanceof MetadataError && error.fileType === 'WAV') {
      if (!options.quiet) {
        console.warn(`Reading as WAV after identification failed: ${error.message}`);
      }
      await reader.seek(0);
      return readWav(reader, options);
    }
    if (error instanceof NoTagsFoundError) {
      try {
        return await untaggedReader.read(reader, options);
      } catch (fallbackError) {
        // a reader took the stream as its own and failed
        if (!isUnsupportedFormatError(fallbackError)) {
          throw fallbackError;
        }
        if (!options.quiet) {
          console.warn(`No reader could read the stream without tags: ${fallbackError instanceof Error ? fallbackError.message : String(fallbackError)}`);
        }
        throw error;
      }
    }
    throw error;
  }

  await reader.seek(0);
  switch (classification.container) {
    case 'MP3': {
      const size = await reader.size();
      return classification.format === 'ID3v1' ? readMp3WithId3v1(reader, size, options) : readMp3WithId3v2(reader, size, options);
    }
    case 'FLAC': {
      return readFlac(reader, options);
    }
    case 'OGG': {
      return readOgg(reader, options);
    }
    case 'MP4': {
      return readMp4(reader, classification, options);
    }
    case 'WAV': {
      return readWav(reader, options);
    }
    case 'DSF': {
      return readDsf(reader, options);
    }
    default: {
      throw new UnsupportedFormatError(`Unsupported container: ${String(classification.container)}`);
    }
  }
}

/**
 * Read the metadata of an audio file from a file path.
 * This function works in Node.js environment but not in browser.
 * @param filePath The path to the audio file
 * @param options Options
 * @returns The metadata
 */
export async function readMetadataFromFile(filePath: string, options?: ReadMetadataOptions): Promise<Metadata> {
  const stream = await FileStream.open(filePath);
  try {
    return await readMetadata(stream, options);
  } finally {
    await stream.close();
  }
}
