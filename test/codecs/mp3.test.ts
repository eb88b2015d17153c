import { describe, expect, it } from '@jest/globals';

import { computeMp3Duration, hasFrameSync, parseMpegFrameHeader } from '../../src/codecs/mp3';
import { UnsupportedFormatError } from '../../src/utils';
import { MPEG1_LAYER3_128K_FRAME_SIZE, MPEG1_LAYER3_128K_HEADER } from '../test-utils';

describe('MPEG frame header', () => {
  it('should decode an MPEG 1 Layer III header', () => {
    expect(parseMpegFrameHeader(MPEG1_LAYER3_128K_HEADER)).toEqual({
      version: 3,
      layer: 1,
      protection: 0,
      bitrateIndex: 9,
      sampleRateIndex: 0,
      padding: 0,
      bitrate: 128,
      sampleRate: 44_100,
      samplesPerFrame: 1152,
      frameDurationInSeconds: 1152 / 44_100,
      frameSize: MPEG1_LAYER3_128K_FRAME_SIZE,
    });
  });

  it('should add 2 bytes when the protection bit is set', () => {
    expect(parseMpegFrameHeader(new Uint8Array([0xff, 0xfb, 0x90, 0x00])).frameSize).toBe(423);
  });

  it('should add a slot when the padding bit is set', () => {
    // sample rate index 1 (48000 Hz), whose low bit is read as padding
    const info = parseMpegFrameHeader(new Uint8Array([0xff, 0xfa, 0x94, 0x00]));
    expect(info.sampleRate).toBe(48_000);
    expect(info.padding).toBe(1);
    expect(info.frameSize).toBe(384 + 1 + 4);
  });

  it.each<[string, number[]]>([
    ['reserved version', [0xff, 0xea, 0x90, 0x00]],
    ['reserved layer', [0xff, 0xf8, 0x90, 0x00]],
    ['free bitrate', [0xff, 0xfa, 0x00, 0x00]],
    ['bad bitrate', [0xff, 0xfa, 0xf0, 0x00]],
    ['reserved sample rate', [0xff, 0xfa, 0x9c, 0x00]],
  ])('should reject a header with %s', (_name, header) => {
    expect(() => parseMpegFrameHeader(new Uint8Array(header))).toThrow(UnsupportedFormatError);
  });

  it('should detect the frame sync', () => {
    expect(hasFrameSync(MPEG1_LAYER3_128K_HEADER)).toBe(true);
    expect(hasFrameSync(new Uint8Array([0xff, 0x1a, 0x90, 0x00]))).toBe(false);
    expect(hasFrameSync(new Uint8Array([0xff]))).toBe(false);
  });
});

describe('computeMp3Duration', () => {
  it('should give the duration of 100 frames in whole seconds', () => {
    const duration = computeMp3Duration(MPEG1_LAYER3_128K_HEADER, 100 * MPEG1_LAYER3_128K_FRAME_SIZE);
    expect(duration).toBe(Math.round((100 * 1152) / 44_100));
    expect(duration).toBe(3);
  });

  it('should give 0 for an empty stream', () => {
    expect(computeMp3Duration(MPEG1_LAYER3_128K_HEADER, 0)).toBe(0);
  });
});
