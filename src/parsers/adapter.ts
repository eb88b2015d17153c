import { withRetry } from '@handy-common-utils/promise-utils';

import { Metadata } from '../metadata';
import { StreamReader } from '../stream';
import { isUnsupportedFormatError, ResolvedReadMetadataOptions } from '../utils';

/**
 * A container reader that decides on its own whether the stream is something it can read.
 */
export interface MetadataReader {
  /**
   * Reads the stream and extracts metadata.
   * @param reader Reader over the whole stream, its cursor may be anywhere
   * @param options Resolved options
   * @returns A promise that resolves to the extracted metadata.
   * @throws An error with `isUnsupportedFormatError` set if the stream is not in the reader's format.
   */
  read(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<Metadata>;
}

/**
 * A composite reader that tries multiple readers in sequence.
 * It implements the Chain of Responsibility pattern.
 */
export class FallbackChainReader implements MetadataReader {
  private readonly readers: MetadataReader[];

  /**
   * Creates a new FallbackChainReader.
   * @param readers The list of readers to try, in order.
   */
  constructor(readers: MetadataReader[]) {
    this.readers = readers;
  }

  /**
   * Tries the readers one after another, moving on only when a reader
   * rejects the stream as not being in its format.
   * @param reader Reader over the whole stream
   * @param options Resolved options
   * @returns The metadata from the first reader that succeeds
   * @throws Error from the last reading attempt.
   */
  async read(reader: StreamReader, options: ResolvedReadMetadataOptions): Promise<Metadata> {
    let i = 0;
    return withRetry(
      async () => {
        await reader.seek(0);
        return this.readers[i++].read(reader, options);
      },
      () => 0,
      (error) => i < this.readers.length && isUnsupportedFormatError(error),
    );
  }
}
