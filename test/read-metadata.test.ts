import { afterEach, describe, expect, it, jest } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { readMetadata, readMetadataFromFile } from '../src/read-metadata';
import { BufferStream } from '../src/stream';
import { EndOfStreamError, NoTagsFoundError, UnsupportedVersionError } from '../src/utils';
import {
  bytes,
  dsfFile,
  fmtChunk,
  flacBlock,
  flacFile,
  id3v1Tag,
  id3v2Tag,
  lacing,
  MPEG1_LAYER3_128K_FRAME_SIZE,
  MPEG1_LAYER3_128K_HEADER,
  mpegFrames,
  oggPage,
  riffChunk,
  silentWav,
  streamInfo,
  textFrame,
  vorbisComment,
  vorbisIdentificationPacket,
  wavFile,
} from './test-utils';

const frames = mpegFrames(MPEG1_LAYER3_128K_HEADER, MPEG1_LAYER3_128K_FRAME_SIZE, 100);

function flacWithTitle(title: string): Uint8Array {
  return flacFile(
    flacBlock(0, streamInfo({ sampleRate: 48_000, channels: 2, bitsPerSample: 24, totalSamples: 48_000 * 3 })),
    flacBlock(4, vorbisComment('test', [`TITLE=${title}`]), true),
  );
}

function read(data: Uint8Array, quiet = true) {
  return readMetadata(new BufferStream(data), { quiet });
}

describe('readMetadata', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should read FLAC', async () => {
    const metadata = await read(flacWithTitle('Flac Title'));
    expect(metadata).toMatchObject({ container: 'FLAC', fileType: 'FLAC', format: 'VORBIS', title: 'Flac Title', durationInSeconds: 3 });
  });

  it('should read OGG', async () => {
    const identification = vorbisIdentificationPacket(44_100);
    const comment = bytes([3], 'vorbis', vorbisComment('test', ['TITLE=Ogg Title']), [1]);
    const data = bytes(
      oggPage({ flags: 0x02, segments: lacing(identification.length), data: identification }),
      oggPage({ sequenceNumber: 1, segments: lacing(comment.length), data: comment }),
      oggPage({ flags: 0x04, sequenceNumber: 2, granulePosition: 441_000n, segments: [1], data: new Uint8Array(1) }),
    );
    const metadata = await read(data);
    expect(metadata).toMatchObject({ container: 'OGG', fileType: 'OGG', title: 'Ogg Title', durationInSeconds: 10 });
  });

  it('should read an MP3 with an ID3v2 tag', async () => {
    const metadata = await read(bytes(id3v2Tag(3, [textFrame(3, 'TIT2', 'Front Tag')]), frames));
    expect(metadata).toMatchObject({ container: 'MP3', fileType: 'MP3', format: 'ID3v2.3', title: 'Front Tag', durationInSeconds: 3 });
  });

  it('should read an MP3 with an ID3v1 tag', async () => {
    const metadata = await read(bytes(frames, id3v1Tag({ title: 'Back Tag' })));
    expect(metadata).toMatchObject({ container: 'MP3', format: 'ID3v1', title: 'Back Tag', durationInSeconds: 3 });
  });

  it('should read an MP3 without tags', async () => {
    const metadata = await read(frames);
    expect(metadata).toMatchObject({ container: 'MP3', format: 'UnknownFormat', title: '', durationInSeconds: 3 });
  });

  it('should read a WAV file without tags', async () => {
    const metadata = await read(silentWav(44_100, 2, 16, 2));
    expect(metadata).toMatchObject({ container: 'WAV', fileType: 'WAV', format: 'UnknownFormat', durationInSeconds: 2 });
  });

  it('should warn about reading as WAV when not quiet', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    await read(silentWav(8000, 1, 8, 1), false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Reading as WAV after identification failed: End of stream at offset 8044');
  });

  it('should read a WAV file with an ID3v2 chunk', async () => {
    const data = wavFile(
      fmtChunk({ channels: 1, sampleRate: 8000, bitsPerSample: 16 }),
      riffChunk('data', new Uint8Array(16_000)),
      riffChunk('id3 ', id3v2Tag(3, [textFrame(3, 'TIT2', 'Wav Title')])),
    );
    const metadata = await read(data);
    expect(metadata).toMatchObject({ container: 'WAV', format: 'ID3v2.3', title: 'Wav Title', durationInSeconds: 1 });
  });

  it('should read a WAV file with an ID3v2 tag appended after the data chunk', async () => {
    const metadata = await read(bytes(silentWav(8000, 1, 8, 1), id3v2Tag(4, [textFrame(4, 'TIT2', 'Appended')])));
    expect(metadata).toMatchObject({ container: 'WAV', fileType: 'WAV', format: 'ID3v2.4', title: 'Appended', durationInSeconds: 1 });
  });

  it('should read DSF', async () => {
    const data = dsfFile({ sampleRate: 2_822_400, sampleCount: 2_822_400n * 3n, audioSize: 256, tag: id3v2Tag(3, [textFrame(3, 'TIT2', 'Dsf Title')]) });
    const metadata = await read(data);
    expect(metadata).toMatchObject({ container: 'DSF', fileType: 'DSF', format: 'ID3v2.3', title: 'Dsf Title', durationInSeconds: 3 });
  });

  it('should read a DSF file smaller than an ID3v1 tag', async () => {
    const metadata = await read(dsfFile({ sampleRate: 2_822_400, sampleCount: 2_822_400n }));
    expect(metadata).toMatchObject({ container: 'DSF', durationInSeconds: 1 });
  });

  it('should report the error of a fallback reader that recognised the stream', async () => {
    const data = dsfFile({ sampleRate: 2_822_400, sampleCount: 2_822_400n, tagPointer: 1_000_000 });
    await expect(read(data)).rejects.toThrow(EndOfStreamError);
  });

  it('should report that nothing was found when no reader fits', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    await expect(read(new Uint8Array(1000), false)).rejects.toThrow(NoTagsFoundError);
    expect(warn).toHaveBeenCalledWith('No reader could read the stream without tags: Expected MPEG frame sync at the start of the stream');
  });

  it('should stay silent by default', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    await expect(readMetadata(new BufferStream(new Uint8Array(1000)))).rejects.toThrow(NoTagsFoundError);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should propagate errors that are not about missing tags', async () => {
    await expect(read(bytes('ID3', [9, 0, 0], new Uint8Array(100)))).rejects.toThrow(UnsupportedVersionError);
  });

  it('should use replacement decoders', async () => {
    const metadata = await readMetadata(new BufferStream(flacWithTitle('Ignored')), {
      decoders: { vorbisComment: async () => ({ title: 'Replaced', raw: {} }) },
    });
    expect(metadata.title).toBe('Replaced');
  });
});

describe('readMetadataFromFile', () => {
  it('should read a file and close it', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'audio-tag-reader-'));
    try {
      const file = path.join(dir, 'song.flac');
      fs.writeFileSync(file, flacWithTitle('From File'));
      const metadata = await readMetadataFromFile(file);
      expect(metadata).toMatchObject({ container: 'FLAC', title: 'From File' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
