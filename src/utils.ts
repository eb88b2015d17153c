import type { FileType } from './metadata';
import type { TagDecoders } from './tags/decoders';

export type ErrorKind =
  | 'IOError'
  | 'FormatMismatch'
  | 'UnsupportedVersion'
  | 'UnsupportedFormat'
  | 'ChecksumMismatch'
  | 'OrphanedContinuation'
  | 'NoTagsFound'
  | 'InvalidArgument';

export interface ParsingError {
  isUnsupportedFormatError?: boolean;
  /**
   * Best-guess file type, set when the container was recognised before the error happened
   */
  fileType?: FileType;
}

/**
 * Base class of all errors thrown while reading metadata.
 */
export abstract class MetadataError extends Error implements ParsingError {
  abstract readonly kind: ErrorKind;
  readonly isUnsupportedFormatError: boolean = false;
  fileType?: FileType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Error thrown when the underlying stream fails or ends before the expected data.
 */
export class IOError extends MetadataError {
  readonly kind = 'IOError';
}

/**
 * The cursor was already at the end of the stream when a read was requested.
 */
export class EndOfStreamError extends IOError {}

/**
 * The stream ended in the middle of a read.
 */
export class UnexpectedEOFError extends IOError {}

/**
 * Error thrown when an expected magic string or marker is absent.
 */
export class FormatMismatchError extends MetadataError {
  readonly kind = 'FormatMismatch';
  override readonly isUnsupportedFormatError = true;
}

export class UnsupportedVersionError extends MetadataError {
  readonly kind = 'UnsupportedVersion';
  override readonly isUnsupportedFormatError = true;
}

/**
 * Error thrown when a parser encounters an unsupported file format or invalid data.
 */
export class UnsupportedFormatError extends MetadataError {
  readonly kind = 'UnsupportedFormat';
  override readonly isUnsupportedFormatError = true;
}

export class ChecksumMismatchError extends MetadataError {
  readonly kind = 'ChecksumMismatch';

  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(message);
  }
}

/**
 * An OGG page is flagged as continued but no packet of its logical stream is pending.
 */
export class OrphanedContinuationError extends MetadataError {
  readonly kind = 'OrphanedContinuation';

  constructor(public readonly serialNumber: number) {
    super(`Could not find continued packet of OGG stream ${serialNumber}`);
  }
}

export class NoTagsFoundError extends MetadataError {
  readonly kind = 'NoTagsFound';
  override readonly isUnsupportedFormatError = true;

  constructor(message = 'No tags found') {
    super(message);
  }
}

export class InvalidArgumentError extends MetadataError {
  readonly kind = 'InvalidArgument';
}

/**
 * Check whether the error is one of ours and the reading could continue with another reader
 * @param error Anything caught
 * @returns true if another reader could be tried
 */
export function isUnsupportedFormatError(error: unknown): boolean {
  return error instanceof MetadataError && error.isUnsupportedFormatError;
}

export const DEFAULT_MAX_UPFRONT_READ_BYTES = 10 * 1024 * 1024;

export interface ReadMetadataOptions {
  /**
   * Whether to suppress console output.
   * Default value is true.
   */
  quiet?: boolean;
  /**
   * Largest number of bytes allocated at once for a single read.
   * Longer reads are done incrementally.
   * Default value is 10 MiB.
   */
  maxUpfrontReadBytes?: number;
  /**
   * Replacements for the built-in tag decoders
   */
  decoders?: Partial<TagDecoders>;
}

export type ResolvedReadMetadataOptions = Required<Omit<ReadMetadataOptions, 'decoders'>> & {
  decoders: TagDecoders;
};
