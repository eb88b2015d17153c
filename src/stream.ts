import { type FileHandle, open } from 'node:fs/promises';

import { readAscii, readUInt16BE, readUInt16LE, readUInt24BE, readUInt32BE, readUInt32LE, readUInt64LE } from './codecs/binary';
import { DEFAULT_MAX_UPFRONT_READ_BYTES, EndOfStreamError, InvalidArgumentError, IOError, MetadataError, UnexpectedEOFError } from './utils';

export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * A byte stream with a cursor that can be repositioned.
 * All readers in this package only ever talk to the input through this interface.
 */
export interface SeekableStream {
  /**
   * Read up to `length` bytes at the cursor and advance the cursor by the number of bytes returned.
   * Fewer bytes are returned only at the end of the stream.
   */
  read(length: number): Promise<Uint8Array>;
  /**
   * Move the cursor. Positions beyond the end are allowed, reads there return no data.
   * @returns The new absolute position
   */
  seek(offset: number, origin: SeekOrigin): Promise<number>;
  close?(): Promise<void>;
}

function resolvePosition(current: number, size: number, offset: number, origin: SeekOrigin): number {
  const base = origin === 'start' ? 0 : origin === 'current' ? current : size;
  const position = base + offset;
  if (position < 0) {
    throw new IOError(`Cannot seek to negative position ${position}`);
  }
  return position;
}

/**
 * Seekable stream over bytes held in memory
 */
export class BufferStream implements SeekableStream {
  private position = 0;

  constructor(private readonly data: Uint8Array) {}

  async read(length: number): Promise<Uint8Array> {
    if (this.position >= this.data.length) {
      return new Uint8Array(0);
    }
    const start = this.position;
    this.position = Math.min(start + length, this.data.length);
    return this.data.subarray(start, this.position);
  }

  async seek(offset: number, origin: SeekOrigin): Promise<number> {
    this.position = resolvePosition(this.position, this.data.length, offset, origin);
    return this.position;
  }
}

/**
 * Seekable stream over an opened file.
 * This works in Node.js environment but not in browser.
 */
export class FileStream implements SeekableStream {
  private position = 0;

  private constructor(
    private readonly handle: FileHandle,
    private readonly fileSize: number,
  ) {}

  /**
   * Open a file for reading.
   * **Important:** The caller is responsible for calling `close()` to release the file handle.
   * @param filePath The path to the file
   * @returns The stream
   */
  static async open(filePath: string): Promise<FileStream> {
    const handle = await open(filePath, 'r');
    try {
      const stat = await handle.stat();
      return new FileStream(handle, stat.size);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async read(length: number): Promise<Uint8Array> {
    const toRead = Math.max(0, Math.min(length, this.fileSize - this.position));
    if (toRead === 0) {
      return new Uint8Array(0);
    }
    const buffer = new Uint8Array(toRead);
    const { bytesRead } = await this.handle.read(buffer, 0, toRead, this.position);
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  async seek(offset: number, origin: SeekOrigin): Promise<number> {
    this.position = resolvePosition(this.position, this.fileSize, offset, origin);
    return this.position;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Cursor based reader of fixed size fields on top of a SeekableStream
 */
export class StreamReader {
  private position = 0;

  constructor(
    private readonly stream: SeekableStream,
    private readonly maxUpfrontReadBytes = DEFAULT_MAX_UPFRONT_READ_BYTES,
  ) {}

  /**
   * Current absolute position of the cursor
   * @returns The position
   */
  tell(): number {
    return this.position;
  }

  async seek(offset: number, origin: SeekOrigin = 'start'): Promise<number> {
    this.position = await this.io(() => this.stream.seek(offset, origin));
    return this.position;
  }

  async skip(length: number): Promise<number> {
    return this.seek(length, 'current');
  }

  /**
   * Total size of the stream. The cursor is left where it was.
   * @returns Size in bytes
   */
  async size(): Promise<number> {
    const position = this.position;
    const size = await this.seek(0, 'end');
    await this.seek(position);
    return size;
  }

  /**
   * Read exactly `length` bytes.
   * Requests larger than the up-front cap are read in chunks, so that a bogus length field fails
   * at the end of the stream before anything that large is allocated.
   * @param length Number of bytes
   * @returns The bytes
   * @throws EndOfStreamError if the cursor was already at the end of the stream
   * @throws UnexpectedEOFError if the stream ended before `length` bytes were read
   */
  async readBytes(length: number): Promise<Uint8Array> {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new InvalidArgumentError(`Invalid read length ${length}`);
    }
    if (length === 0) {
      return new Uint8Array(0);
    }
    if (length <= this.maxUpfrontReadBytes) {
      const bytes = await this.readChunk(length);
      this.checkLength(bytes.length, length);
      return bytes;
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    while (total < length) {
      const chunk = await this.readChunk(Math.min(this.maxUpfrontReadBytes, length - total));
      if (chunk.length === 0) {
        break;
      }
      chunks.push(chunk);
      total += chunk.length;
    }
    this.checkLength(total, length);

    const result = new Uint8Array(length);
    let offset = 0;
    for (const chunk of chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }

  /**
   * Read bytes without moving the cursor
   * @param length Number of bytes
   * @returns The bytes
   */
  async peek(length: number): Promise<Uint8Array> {
    const position = this.position;
    const bytes = await this.readBytes(length);
    await this.seek(position);
    return bytes;
  }

  async readString(length: number): Promise<string> {
    return readAscii(await this.readBytes(length));
  }

  async readUInt8(): Promise<number> {
    return (await this.readBytes(1))[0];
  }

  async readUInt16LE(): Promise<number> {
    return readUInt16LE(await this.readBytes(2), 0);
  }

  async readUInt32LE(): Promise<number> {
    return readUInt32LE(await this.readBytes(4), 0);
  }

  async readUInt64LE(): Promise<bigint> {
    return readUInt64LE(await this.readBytes(8), 0);
  }

  async readUInt16BE(): Promise<number> {
    return readUInt16BE(await this.readBytes(2), 0);
  }

  async readUInt24BE(): Promise<number> {
    return readUInt24BE(await this.readBytes(3), 0);
  }

  async readUInt32BE(): Promise<number> {
    return readUInt32BE(await this.readBytes(4), 0);
  }

  /**
   * Read a region of the stream and return a reader over just that region
   * @param length Length of the region
   * @returns Reader positioned at the start of the region
   */
  async subReader(length: number): Promise<StreamReader> {
    return new StreamReader(new BufferStream(await this.readBytes(length)), this.maxUpfrontReadBytes);
  }

  private async readChunk(length: number): Promise<Uint8Array> {
    const bytes = await this.io(() => this.stream.read(length));
    this.position += bytes.length;
    return bytes;
  }

  private checkLength(actual: number, expected: number): void {
    if (actual === 0) {
      throw new EndOfStreamError(`End of stream at offset ${this.position}`);
    }
    if (actual < expected) {
      throw new UnexpectedEOFError(`Unexpected end of stream: wanted ${expected} bytes, got ${actual} at offset ${this.position - actual}`);
    }
  }

  private async io<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof MetadataError) {
        throw error;
      }
      throw new IOError(`Stream operation failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
