import { readAscii, startsWithAscii } from '../codecs/binary';
import { ID3V1_SIZE, toId3v2Format } from '../codecs/id3';
import { Classification, ContainerType, FileType } from '../metadata';
import { StreamReader } from '../stream';
import { MetadataError, NoTagsFoundError, UnsupportedFormatError } from '../utils';
import { seekPastWavAudio } from './wav';

const PREFIX_SIZE = 12;

/**
 * Only one level of RIFF wrapping is expected: the WAV file itself and whatever follows its audio
 */
const MAX_IDENTIFY_DEPTH = 2;

/**
 * Header of the RIFF chunk some encoders put an ID3v2 tag in, skipped when it follows the audio
 */
const ID3_CHUNK_HEADER_SIZE = 8;

function classification(format: Classification['format'], container: Exclude<ContainerType, 'MP4'>): Classification {
  return Object.freeze({ format, container, fileType: container });
}

function mp4FileType(brand: string): FileType {
  switch (brand) {
    case 'M4A':
    case 'M4B':
    case 'M4P': {
      return brand;
    }
    default: {
      return 'UnknownFileType';
    }
  }
}

/**
 * Classify by the first bytes of the stream
 * @param prefix The first 12 bytes
 * @returns The classification, 'RIFF' if it's a WAV file that needs a look beyond its audio, or undefined if nothing matched
 */
function classifyPrefix(prefix: Uint8Array): Classification | 'RIFF' | undefined {
  if (startsWithAscii(prefix, 'fLaC')) {
    return classification('VORBIS', 'FLAC');
  }
  if (startsWithAscii(prefix, 'OggS')) {
    return classification('VORBIS', 'OGG');
  }
  if (startsWithAscii(prefix, 'ftyp', 4)) {
    return Object.freeze({ format: 'MP4', container: 'MP4', fileType: mp4FileType(readAscii(prefix, 8, 3)) });
  }
  if (startsWithAscii(prefix, 'ID3')) {
    return classification(toId3v2Format(prefix[3]), 'MP3');
  }
  if (startsWithAscii(prefix, 'RIFF') && startsWithAscii(prefix, 'WAVE', 8)) {
    return 'RIFF';
  }
  return undefined;
}

async function classifyTrailer(reader: StreamReader): Promise<Classification> {
  const size = await reader.size();
  if (size < ID3V1_SIZE) {
    throw new NoTagsFoundError();
  }
  await reader.seek(size - ID3V1_SIZE);
  if ((await reader.readString(3)) !== 'TAG') {
    throw new NoTagsFoundError();
  }
  return classification('ID3v1', 'MP3');
}

/**
 * Identify the tag format and container of a stream from its first 12 bytes and, failing that,
 * from an ID3v1 trailer.
 *
 * A WAV file is looked into beyond its audio payload, because some encoders append an ID3 tag there.
 * The format found there is reported with container WAV. Errors raised after a WAV file has been
 * recognised carry `fileType: 'WAV'`.
 *
 * The position of the cursor afterwards is unspecified.
 *
 * @param reader Reader positioned at the start of the stream
 * @returns The classification
 * @throws UnsupportedVersionError if the ID3v2 version is not 2, 3 or 4
 * @throws NoTagsFoundError if nothing could be recognised
 */
export async function identify(reader: StreamReader): Promise<Classification> {
  let outerContainer: 'WAV' | undefined;
  try {
    for (let depth = 0; depth < MAX_IDENTIFY_DEPTH; depth++) {
      const found = classifyPrefix(await reader.peek(PREFIX_SIZE));
      if (found === 'RIFF') {
        outerContainer = 'WAV';
        await seekPastWavAudio(reader);
        if (startsWithAscii(await reader.peek(3), 'id3')) {
          await reader.skip(ID3_CHUNK_HEADER_SIZE);
        }
        continue;
      }
      const result = found ?? (await classifyTrailer(reader));
      return outerContainer ? classification(result.format, outerContainer) : result;
    }
    throw new UnsupportedFormatError('RIFF data nested in RIFF data is not supported');
  } catch (error) {
    if (outerContainer && error instanceof MetadataError) {
      error.fileType = outerContainer;
    }
    throw error;
  }
}
