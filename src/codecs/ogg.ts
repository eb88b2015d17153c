/**
 * OGG page demuxing
 * Based on: https://xiph.org/ogg/doc/framing.html
 */

import { StreamReader } from '../stream';
import { ChecksumMismatchError, FormatMismatchError, OrphanedContinuationError } from '../utils';
import { readAscii, readUInt32LE, readUInt64LE } from './binary';

export const OGG_PAGE_HEADER_SIZE = 27;
export const OGG_CRC_OFFSET = 22;

export const OGG_FLAG_CONTINUED = 0x01;
export const OGG_FLAG_BOS = 0x02;
export const OGG_FLAG_EOS = 0x04;

/**
 * Granule position of a page on which no packet finishes
 */
export const OGG_NO_GRANULE_POSITION = 0xffffffffffffffffn;

let crcTable: Uint32Array | undefined;

/**
 * Get or generate the CRC lookup table for polynomial 0x04c11db7 (non-reflected)
 * @returns CRC lookup table
 */
function getCrcTable(): Uint32Array {
  if (!crcTable) {
    const table = new Uint32Array(256);
    for (let i = 0; i < 256; i++) {
      let crc = i << 24;
      for (let j = 0; j < 8; j++) {
        crc = crc & 0x80000000 ? (crc << 1) ^ 0x04c11db7 : crc << 1;
      }
      table[i] = crc >>> 0;
    }
    crcTable = table;
  }
  return crcTable;
}

/**
 * Continue an OGG CRC-32 computation over more data
 * @param crc CRC of the data so far, 0 to start
 * @param data More data
 * @returns The updated CRC
 */
export function updateOggCrc(crc: number, data: Uint8Array): number {
  const table = getCrcTable();
  for (const byte of data) {
    crc = (crc << 8) ^ table[((crc >>> 24) ^ byte) & 0xff];
  }
  return crc >>> 0;
}

export interface OggPage {
  /**
   * Packets completed on this page, possibly started on earlier pages
   */
  packets: Uint8Array[];
  granulePosition: bigint;
  serialNumber: number;
  sequenceNumber: number;
  flags: number;
}

/**
 * Reassembly state of one physical OGG stream.
 * Partial packets are kept per logical stream (serial number) until a later page completes them.
 * A session must not be shared between unrelated streams.
 */
export class OggDemuxSession {
  private readonly pending = new Map<number, Uint8Array[]>();

  /**
   * Segments of the packet still open for a logical stream
   * @param serialNumber Serial number of the logical stream
   * @returns The segments, or undefined if no page of that stream has been seen
   */
  pendingSegments(serialNumber: number): Uint8Array[] | undefined {
    return this.pending.get(serialNumber);
  }

  setPendingSegments(serialNumber: number, segments: Uint8Array[]): void {
    this.pending.set(serialNumber, segments);
  }
}

function concat(segments: Uint8Array[]): Uint8Array {
  const packet = new Uint8Array(segments.reduce((sum, s) => sum + s.length, 0));
  let offset = 0;
  for (const s of segments) {
    packet.set(s, offset);
    offset += s.length;
  }
  return packet;
}

/**
 * Read one page at the cursor, verify its checksum and reconstruct the packets it completes.
 * A page that only carries the beginning or the middle of a packet returns no packets.
 *
 * @param reader Reader positioned at the start of a page
 * @param session Reassembly state shared by all pages of the stream
 * @returns The page
 * @throws EndOfStreamError if the reader is at the end of the stream
 * @throws FormatMismatchError if the capture pattern "OggS" is missing
 * @throws ChecksumMismatchError if the CRC doesn't match the page content
 * @throws OrphanedContinuationError if the page continues a packet that was never started
 */
export async function readOggPage(reader: StreamReader, session: OggDemuxSession): Promise<OggPage> {
  const pageOffset = reader.tell();
  // copy, the CRC field gets zeroed below
  const header = (await reader.readBytes(OGG_PAGE_HEADER_SIZE)).slice();

  if (readAscii(header, 0, 4) !== 'OggS') {
    throw new FormatMismatchError(`Expected 'OggS' at offset ${pageOffset}`);
  }

  const flags = header[5];
  const granulePosition = readUInt64LE(header, 6);
  const serialNumber = readUInt32LE(header, 14);
  const sequenceNumber = readUInt32LE(header, 18);
  const storedCrc = readUInt32LE(header, OGG_CRC_OFFSET);
  const segmentCount = header[26];

  const segmentTable = await reader.readBytes(segmentCount);
  const dataSize = segmentTable.reduce((sum, s) => sum + s, 0);
  const data = await reader.readBytes(dataSize);

  header.fill(0, OGG_CRC_OFFSET, OGG_CRC_OFFSET + 4);
  let crc = updateOggCrc(0, header);
  crc = updateOggCrc(crc, segmentTable);
  crc = updateOggCrc(crc, data);
  if (crc !== storedCrc) {
    throw new ChecksumMismatchError(
      `Expected CRC ${storedCrc.toString(16)} but got ${crc.toString(16)} for OGG page at offset ${pageOffset}`,
      storedCrc,
      crc,
    );
  }

  let segments: Uint8Array[] = [];
  if (flags & OGG_FLAG_CONTINUED) {
    const pending = session.pendingSegments(serialNumber);
    if (!pending) {
      throw new OrphanedContinuationError(serialNumber);
    }
    segments = pending;
  }

  const packets: Uint8Array[] = [];
  let offset = 0;
  for (const size of segmentTable) {
    segments.push(data.subarray(offset, offset + size));
    offset += size;
    if (size < 255) {
      packets.push(concat(segments));
      segments = [];
    }
  }
  session.setPendingSegments(serialNumber, segments);

  return { packets, granulePosition, serialNumber, sequenceNumber, flags };
}
