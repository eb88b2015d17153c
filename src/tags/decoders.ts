import { Picture, TagFields } from '../metadata';
import { StreamReader } from '../stream';
import { decodeId3v1Tags } from './id3v1';
import { decodeId3v2Tags } from './id3v2';
import { decodeMp4Atoms } from './mp4-atoms';
import { decodeFlacPicture, decodeVorbisComment } from './vorbis-comment';

/**
 * Decodes one tag region. The reader is positioned at the start of the region,
 * the decoder consumes exactly the bytes of the region.
 */
export type TagDecoder<T = TagFields> = (reader: StreamReader) => Promise<T>;

/**
 * The decoders that container readers hand the tag regions they locate to.
 * Any of them can be replaced through `ReadMetadataOptions.decoders`.
 */
export interface TagDecoders {
  id3v2: TagDecoder;
  id3v1: TagDecoder;
  vorbisComment: TagDecoder;
  flacPicture: TagDecoder<Picture>;
  /**
   * Receives the payload of the "ilst" atom
   */
  mp4Atoms: TagDecoder;
}

export const defaultTagDecoders: Readonly<TagDecoders> = Object.freeze({
  id3v2: decodeId3v2Tags,
  id3v1: decodeId3v1Tags,
  vorbisComment: decodeVorbisComment,
  flacPicture: decodeFlacPicture,
  mp4Atoms: decodeMp4Atoms,
});
