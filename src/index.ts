export * from './metadata';
export * from './read-metadata';
export * from './utils';
export { BufferStream, FileStream, StreamReader } from './stream';
export type { SeekableStream, SeekOrigin } from './stream';
export { defaultTagDecoders } from './tags/decoders';
export type { TagDecoder, TagDecoders } from './tags/decoders';

export { cutBits, get7BitChunkedValue, getChunkedValue } from './codecs/binary';
export { computeMp3Duration, parseMpegFrameHeader } from './codecs/mp3';
export type { MpegFrameInfo } from './codecs/mp3';
export { OggDemuxSession, readOggPage } from './codecs/ogg';
export type { OggPage } from './codecs/ogg';

export { identify } from './parsers/identify';
export { readDsf } from './parsers/dsf';
export { readFlac } from './parsers/flac';
export { readMp3WithId3v1, readMp3WithId3v2, readUntaggedMp3 } from './parsers/mp3';
export { readMp4 } from './parsers/mp4';
export { readOgg } from './parsers/ogg';
export { readWav, seekPastWavAudio } from './parsers/wav';
