import { UnsupportedFormatError } from '../utils';
import { cutBits } from './binary';

const RESERVED_ROW = [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0] as const;

/**
 * MP3 bitrate table (in kbps) indexed by [version][layer][bitrate_index].
 * Reserved versions and layers have all-zero rows. Index 15 is not allowed and is absent.
 */
const BITRATE_TABLE: ReadonlyArray<ReadonlyArray<readonly number[]>> = [
  // MPEG 2.5
  [
    RESERVED_ROW,
    [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160], // Layer III
    [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160], // Layer II
    [0, 32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256], // Layer I
  ],
  // reserved
  [RESERVED_ROW, RESERVED_ROW, RESERVED_ROW, RESERVED_ROW],
  // MPEG 2
  [
    RESERVED_ROW,
    [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160], // Layer III
    [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160], // Layer II
    [0, 32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256], // Layer I
  ],
  // MPEG 1
  [
    RESERVED_ROW,
    [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320], // Layer III
    [0, 32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384], // Layer II
    [0, 32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448], // Layer I
  ],
];

/**
 * MP3 sample rate table (in Hz) indexed by [version][sample_rate_index]
 */
const SAMPLE_RATE_TABLE: ReadonlyArray<readonly number[]> = [
  [11025, 12000, 8000], // MPEG 2.5
  [0, 0, 0], // reserved
  [22050, 24000, 16000], // MPEG 2
  [44100, 48000, 32000], // MPEG 1
];

/**
 * Samples per frame indexed by [version][layer]
 */
const SAMPLES_PER_FRAME_TABLE: ReadonlyArray<readonly number[]> = [
  [0, 576, 1152, 384], // MPEG 2.5
  [0, 0, 0, 0], // reserved
  [0, 576, 1152, 384], // MPEG 2
  [0, 1152, 1152, 384], // MPEG 1
];

/**
 * Slot size in bytes indexed by layer
 */
const SLOT_SIZE_TABLE: readonly number[] = [0, 1, 1, 4];

export interface MpegFrameInfo {
  /**
   * 0 = MPEG 2.5, 1 = reserved, 2 = MPEG 2, 3 = MPEG 1
   */
  version: number;
  /**
   * 0 = reserved, 1 = Layer III, 2 = Layer II, 3 = Layer I
   */
  layer: number;
  protection: number;
  bitrateIndex: number;
  sampleRateIndex: number;
  padding: number;
  /**
   * Bitrate in kbps
   */
  bitrate: number;
  sampleRate: number;
  samplesPerFrame: number;
  frameDurationInSeconds: number;
  frameSize: number;
}

/**
 * Check for the 11-bit frame sync at the start of the data
 * @param header At least 2 bytes
 * @returns true if the frame sync is present
 */
export function hasFrameSync(header: Uint8Array): boolean {
  return header.length >= 2 && header[0] === 0xff && (header[1] & 0xe0) === 0xe0;
}

/**
 * Decode the first 32 bits of an MPEG audio frame.
 *
 * The fields are cut at bit offsets 11, 13, 15, 16, 20 and 21, which means the padding bit
 * shares its position with the low bit of the sample rate index.
 * The protection bit adds 2 bytes to the frame size when it is set.
 *
 * @param header The first 4 bytes of the frame
 * @returns Decoded header fields together with frame duration and size
 * @throws UnsupportedFormatError for reserved versions, layers, sample rate indexes and free/bad bitrates
 */
export function parseMpegFrameHeader(header: Uint8Array): MpegFrameInfo {
  const version = Number(cutBits(header, 11, 2));
  const layer = Number(cutBits(header, 13, 2));
  const protection = Number(cutBits(header, 15, 1));
  const bitrateIndex = Number(cutBits(header, 16, 4));
  const sampleRateIndex = Number(cutBits(header, 20, 2));
  const padding = Number(cutBits(header, 21, 1));

  const samplesPerFrame = SAMPLES_PER_FRAME_TABLE[version][layer];
  const sampleRate = SAMPLE_RATE_TABLE[version][sampleRateIndex] ?? 0;
  const bitrate = BITRATE_TABLE[version][layer][bitrateIndex] ?? 0;
  if (samplesPerFrame === 0) {
    throw new UnsupportedFormatError(`Unsupported MPEG version ${version} / layer ${layer} combination`);
  }
  if (sampleRate === 0) {
    throw new UnsupportedFormatError(`Unsupported MPEG sample rate index ${sampleRateIndex}`);
  }
  if (bitrate === 0) {
    throw new UnsupportedFormatError(`Unsupported MPEG bitrate index ${bitrateIndex}`);
  }

  const frameDurationInSeconds = samplesPerFrame / sampleRate;
  let frameSize = Math.floor((frameDurationInSeconds * bitrate * 1000) / 8);
  if (padding === 1) {
    frameSize += SLOT_SIZE_TABLE[layer];
  }
  if (protection === 1) {
    frameSize += 2;
  }
  // the header itself
  frameSize += 4;

  return {
    version,
    layer,
    protection,
    bitrateIndex,
    sampleRateIndex,
    padding,
    bitrate,
    sampleRate,
    samplesPerFrame,
    frameDurationInSeconds,
    frameSize,
  };
}

/**
 * Estimate the duration of a constant bitrate MPEG audio stream from its first frame header
 * @param header The first 4 bytes of the first frame
 * @param strippedSize Number of bytes in the stream that are not tags
 * @returns Duration in whole seconds
 */
export function computeMp3Duration(header: Uint8Array, strippedSize: number): number {
  const { frameSize, frameDurationInSeconds } = parseMpegFrameHeader(header);
  return Math.round((strippedSize / frameSize) * frameDurationInSeconds);
}
