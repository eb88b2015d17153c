import * as mp4box from 'mp4box';
import type { ISOFile, Movie } from 'mp4box';

import { Classification, createMetadata, emptyTagFields, Mp4Metadata, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { readAtomHeader } from '../tags/mp4-atoms';
import { MetadataError, ResolvedReadMetadataOptions, UnsupportedFormatError } from '../utils';

type Mp4BoxModule = typeof mp4box;

const MP4_FILE_TYPES = ['M4A', 'M4B', 'M4P'] as const;

/**
 * Chunk size used when feeding the stream to mp4box
 */
const MP4BOX_CHUNK_SIZE = 1024 * 1024;

/**
 * Path from the top level to the iTunes style metadata list
 */
const ILST_PATH = ['moov', 'udta', 'meta', 'ilst'] as const;

let originalLogError: Mp4BoxModule['Log']['error'] | undefined;

/**
 * Suppress or restore Mp4Box error logging
 * @param mp4box Mp4Box module
 * @param quiet Whether to suppress error logging or restore original behaviour
 */
export function makeMp4BoxQuiet(mp4box: Mp4BoxModule, quiet: boolean): void {
  if (quiet) {
    originalLogError ??= mp4box.Log.error;
    mp4box.Log.error = (module: string, msg?: string, isofile?: ISOFile) => {
      // errors still reach the file's own error handler
      isofile?.onError?.(module, msg ?? '');
    };
  } else if (originalLogError) {
    mp4box.Log.error = originalLogError;
  }
}

/**
 * Feed the stream to mp4box until it has seen the movie header
 * @param reader Reader over the whole file
 * @param size Size of the file
 * @returns Movie information from mp4box
 */
async function readMovieInfo(reader: StreamReader, size: number): Promise<Movie> {
  const mp4file = mp4box.createFile();
  const state: { info?: Movie; error?: string } = {};
  mp4file.onReady = (info: Movie) => {
    state.info = info;
  };
  mp4file.onError = (module: string, message: string) => {
    state.error = message || module;
  };

  await reader.seek(0);
  let offset = 0;
  try {
    while (!state.info && !state.error && offset < size) {
      const chunk = await reader.readBytes(Math.min(MP4BOX_CHUNK_SIZE, size - offset));
      const buffer = new ArrayBuffer(chunk.length);
      new Uint8Array(buffer).set(chunk);
      mp4file.appendBuffer(mp4box.MP4BoxBuffer.fromArrayBuffer(buffer, offset));
      offset += chunk.length;
    }
    mp4file.flush();
  } catch (error) {
    if (error instanceof MetadataError) {
      throw error;
    }
    throw new UnsupportedFormatError(`MP4Box error: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (state.error) {
    throw new UnsupportedFormatError(`MP4Box error: ${state.error}`);
  }
  if (!state.info) {
    throw new UnsupportedFormatError('Stream ended before MP4 info was found');
  }
  return state.info;
}

/**
 * Walk down the atom tree along a path of atom types
 * @param reader Reader over the whole file
 * @param size Size of the file
 * @returns Payload size of the last atom of the path with the cursor at its payload, or undefined if the path doesn't exist
 */
async function findIlst(reader: StreamReader, size: number): Promise<number | undefined> {
  await reader.seek(0);
  let end = size;
  for (const type of ILST_PATH) {
    let found: number | undefined;
    while (found === undefined && reader.tell() + 8 <= end) {
      const header = await readAtomHeader(reader, end);
      if (header.type === type) {
        found = header.size;
      } else {
        await reader.skip(header.size);
      }
    }
    if (found === undefined) {
      return undefined;
    }
    end = reader.tell() + found;
    if (type === 'meta') {
      // a full box with version and flags, except in files written by QuickTime
      const peeked = await reader.peek(8);
      if (peeked[4] !== 0x68 || peeked[5] !== 0x64 || peeked[6] !== 0x6c || peeked[7] !== 0x72) {
        await reader.skip(4);
      }
    }
    if (type === 'ilst') {
      return found;
    }
  }
  return undefined;
}

/**
 * Parses an MP4 (M4A/M4B/M4P) file.
 * Technical information comes from mp4box, tags from the "ilst" atom under moov/udta/meta.
 *
 * @param reader Reader over the whole file
 * @param classification Result of identification, used for the file type
 * @param options Resolved options
 * @returns The metadata
 */
export async function readMp4(reader: StreamReader, classification: Classification, options: ResolvedReadMetadataOptions): Promise<Mp4Metadata> {
  makeMp4BoxQuiet(mp4box, options.quiet);

  const size = await reader.size();
  const info = await readMovieInfo(reader, size);

  let tags: TagFields = emptyTagFields();
  const ilstSize = await findIlst(reader, size);
  if (ilstSize !== undefined) {
    tags = await options.decoders.mp4Atoms(await reader.subReader(ilstSize));
  }

  const audio = info.audioTracks[0]?.audio;
  return createMetadata(
    { container: 'MP4', fileType: MP4_FILE_TYPES.find((t) => t === classification.fileType) ?? 'UnknownFileType' },
    {
      format: 'MP4',
      tags,
      durationInSeconds: info.timescale > 0 ? info.duration / info.timescale : 0,
      raw: {
        brands: info.brands,
        timescale: info.timescale,
        sample_rate: audio?.sample_rate ?? 0,
        channels: audio?.channel_count ?? 0,
      },
    },
  );
}
