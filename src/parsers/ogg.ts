import { readUInt32LE, startsWithAscii } from '../codecs/binary';
import { OGG_NO_GRANULE_POSITION, OggDemuxSession, OggPage, readOggPage } from '../codecs/ogg';
import { createMetadata, emptyTagFields, OggMetadata, TagFields } from '../metadata';
import { BufferStream, StreamReader } from '../stream';
import { EndOfStreamError, NoTagsFoundError, ResolvedReadMetadataOptions } from '../utils';

const VORBIS_IDENTIFICATION = '\u0001vorbis';
const VORBIS_COMMENT = '\u0003vorbis';
const OPUS_HEAD = 'OpusHead';
const OPUS_TAGS = 'OpusTags';

/**
 * Opus always runs at 48 kHz, whatever the input sample rate in the header says
 */
const OPUS_SAMPLE_RATE = 48_000;

function packetReader(packet: Uint8Array, prefixLength: number, options: ResolvedReadMetadataOptions): StreamReader {
  return new StreamReader(new BufferStream(packet.subarray(prefixLength)), options.maxUpfrontReadBytes);
}

/**
 * Parses an OGG stream carrying Vorbis or Opus, page by page until the end of the stream.
 * Tags come from the comment packet, the sample rate from the identification packet,
 * and the duration from the granule position of the last page that has one.
 *
 * @param reader Reader positioned at the first page
 * @param options Resolved options
 * @returns The metadata
 * @throws NoTagsFoundError if there is no Vorbis comment or OpusTags packet
 * @throws ChecksumMismatchError if any page is corrupted
 */
export async function readOgg(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<OggMetadata> {
  const session = new OggDemuxSession();
  let tags: TagFields = emptyTagFields();
  let tagsFound = false;
  let codec = '';
  let sampleRate = 0;
  let channels = 0;
  let position = 0n;
  let pageCount = 0;

  for (;;) {
    let page: OggPage;
    try {
      page = await readOggPage(reader, session);
    } catch (error) {
      if (error instanceof EndOfStreamError) {
        break;
      }
      throw error;
    }
    pageCount++;
    if (page.granulePosition !== OGG_NO_GRANULE_POSITION) {
      position = page.granulePosition;
    }

    for (const packet of page.packets) {
      if (startsWithAscii(packet, VORBIS_COMMENT)) {
        tags = await options.decoders.vorbisComment(packetReader(packet, VORBIS_COMMENT.length, options));
        tagsFound = true;
      } else if (startsWithAscii(packet, OPUS_TAGS)) {
        tags = await options.decoders.vorbisComment(packetReader(packet, OPUS_TAGS.length, options));
        tagsFound = true;
        sampleRate = OPUS_SAMPLE_RATE;
      } else if (startsWithAscii(packet, VORBIS_IDENTIFICATION)) {
        // 4 bytes of version follow the prefix
        codec = 'vorbis';
        channels = packet[11];
        sampleRate = readUInt32LE(packet, 12);
      } else if (startsWithAscii(packet, OPUS_HEAD)) {
        // 1 byte of version follows the prefix
        codec = 'opus';
        channels = packet.length > 9 ? packet[9] : 0;
        sampleRate = OPUS_SAMPLE_RATE;
      }
    }
  }

  if (!tagsFound) {
    throw new NoTagsFoundError('No Vorbis comment or OpusTags packet found in OGG stream');
  }

  return createMetadata(
    { container: 'OGG', fileType: 'OGG' },
    {
      format: 'VORBIS',
      tags,
      durationInSeconds: sampleRate > 0 ? Number(position) / sampleRate : 0,
      raw: {
        sample_rate: sampleRate,
        channels,
        codec,
        granule_position: position,
        page_count: pageCount,
      },
    },
  );
}
