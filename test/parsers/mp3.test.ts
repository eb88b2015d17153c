import { describe, expect, it } from '@jest/globals';

import { readMp3WithId3v1, readMp3WithId3v2, readUntaggedMp3 } from '../../src/parsers/mp3';
import { FormatMismatchError } from '../../src/utils';
import {
  bytes,
  id3v1Tag,
  id3v2Tag,
  MPEG1_LAYER3_128K_FRAME_SIZE,
  MPEG1_LAYER3_128K_HEADER,
  mpegFrames,
  readerOf,
  testOptions,
  textFrame,
} from '../test-utils';

const frames = mpegFrames(MPEG1_LAYER3_128K_HEADER, MPEG1_LAYER3_128K_FRAME_SIZE, 100);

const technical = {
  sample_rate: 44_100,
  bitrate: 128,
  version: 3,
  layer: 1,
  frame_size: MPEG1_LAYER3_128K_FRAME_SIZE,
};

describe('MP3 Parser', () => {
  it('should read an MP3 with an ID3v2 tag', async () => {
    const tag = id3v2Tag(3, [textFrame(3, 'TIT2', 'Track'), textFrame(3, 'TPE1', 'Artist'), textFrame(3, 'TRCK', '3/12'), textFrame(3, 'TCON', '(17)')], {
      padding: 32,
    });
    const data = bytes(tag, frames);

    const metadata = await readMp3WithId3v2(readerOf(data), data.length, testOptions());
    expect(metadata).toMatchObject({
      container: 'MP3',
      fileType: 'MP3',
      format: 'ID3v2.3',
      title: 'Track',
      artist: 'Artist',
      genre: 'Rock',
      track: { current: 3, total: 12 },
      durationInSeconds: 3,
    });
    expect(metadata.raw).toEqual({ TIT2: 'Track', TPE1: 'Artist', TRCK: '3/12', TCON: '(17)', ...technical });
  });

  it('should skip the footer of an ID3v2.4 tag', async () => {
    const data = bytes(id3v2Tag(4, [textFrame(4, 'TALB', 'Album')], { footer: true }), frames);
    const metadata = await readMp3WithId3v2(readerOf(data), data.length, testOptions());
    expect(metadata.format).toBe('ID3v2.4');
    expect(metadata.album).toBe('Album');
    expect(metadata.durationInSeconds).toBe(3);
  });

  it('should read an MP3 with an ID3v1 tag', async () => {
    const data = bytes(frames, id3v1Tag({ title: 'Old', artist: 'Band', year: '1999', track: 5, genre: 0 }));
    const metadata = await readMp3WithId3v1(readerOf(data), data.length, testOptions());
    expect(metadata).toMatchObject({
      format: 'ID3v1',
      title: 'Old',
      artist: 'Band',
      year: 1999,
      genre: 'Blues',
      track: { current: 5, total: 0 },
      durationInSeconds: 3,
    });
    expect(metadata.raw).toEqual({ genre_index: 0, ...technical });
  });

  it('should read an MP3 without tags', async () => {
    const metadata = await readUntaggedMp3(readerOf(frames), frames.length);
    expect(metadata.format).toBe('UnknownFormat');
    expect(metadata.durationInSeconds).toBe(3);
    expect(metadata.raw).toEqual(technical);
  });

  it('should reject data that does not start with a frame', async () => {
    const data = bytes(new Uint8Array(4), frames);
    await expect(readUntaggedMp3(readerOf(data), data.length)).rejects.toThrow(FormatMismatchError);
  });
});
