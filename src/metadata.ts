export type TagFormat = 'UnknownFormat' | 'ID3v1' | 'ID3v2.2' | 'ID3v2.3' | 'ID3v2.4' | 'MP4' | 'VORBIS';

export class ContainerDetails<T extends string> {
  constructor(
    public readonly code: T,
    public readonly fileExtension: string,
    public readonly fileTypes: readonly FileType[],
  ) {}
}

export type FileType = 'UnknownFileType' | 'MP3' | 'M4A' | 'M4B' | 'M4P' | 'FLAC' | 'OGG' | 'WAV' | 'DSF';

const containers = {
  MP3: new ContainerDetails('MP3', 'mp3', ['MP3']),
  FLAC: new ContainerDetails('FLAC', 'flac', ['FLAC']),
  OGG: new ContainerDetails('OGG', 'ogg', ['OGG']),
  /**
   * ftyp sub-types that are not M4A, M4B or M4P are still MP4 containers,
   * they are reported with file type "UnknownFileType".
   */
  MP4: new ContainerDetails('MP4', 'm4a', ['M4A', 'M4B', 'M4P', 'UnknownFileType']),
  WAV: new ContainerDetails('WAV', 'wav', ['WAV']),
  DSF: new ContainerDetails('DSF', 'dsf', ['DSF']),
};

export type ContainerType = keyof typeof containers;

/**
 * Get all containers with their details
 * @returns Array of container details
 */
export function allContainers(): ContainerDetails<ContainerType>[] {
  return Object.values(containers);
}

/**
 * Get the details of a container
 * @param code Container code
 * @returns Details of the container
 */
export function getContainer(code: ContainerType): ContainerDetails<ContainerType> {
  return containers[code];
}

/**
 * Outcome of format sniffing, produced once per stream
 */
export interface Classification {
  readonly format: TagFormat;
  readonly fileType: FileType;
  readonly container: ContainerType;
}

export interface Picture {
  mimeType: string;
  /**
   * Picture type as defined by ID3v2 APIC and FLAC PICTURE, 3 is the front cover
   */
  type: number;
  description: string;
  data: Uint8Array;
}

export interface NumberAndTotal {
  current: number;
  total: number;
}

export type RawValue = string | number | bigint | boolean | Uint8Array | readonly RawValue[];

/**
 * Fields produced by a tag decoder. Everything is optional, the container reader fills in the blanks.
 */
export interface TagFields {
  format?: TagFormat;
  title?: string;
  album?: string;
  artist?: string;
  albumArtist?: string;
  composer?: string;
  genre?: string;
  comment?: string;
  lyrics?: string;
  year?: number;
  track?: NumberAndTotal;
  disc?: NumberAndTotal;
  picture?: Picture;
  raw: Record<string, RawValue>;
}

interface CommonMetadata {
  readonly format: TagFormat;
  readonly fileType: FileType;
  readonly title: string;
  readonly album: string;
  readonly artist: string;
  readonly albumArtist: string;
  readonly composer: string;
  readonly genre: string;
  readonly comment: string;
  readonly lyrics: string;
  readonly year: number;
  readonly track: Readonly<NumberAndTotal>;
  readonly disc: Readonly<NumberAndTotal>;
  readonly picture: Readonly<Picture> | null;
  readonly durationInSeconds: number;
  /**
   * Container specific technical fields and raw tag values, for machine inspection
   */
  readonly raw: Readonly<Record<string, RawValue>>;
}

export interface Mp3Metadata extends CommonMetadata {
  readonly container: 'MP3';
  readonly fileType: 'MP3';
}

export interface FlacMetadata extends CommonMetadata {
  readonly container: 'FLAC';
  readonly fileType: 'FLAC';
}

export interface OggMetadata extends CommonMetadata {
  readonly container: 'OGG';
  readonly fileType: 'OGG';
}

export interface Mp4Metadata extends CommonMetadata {
  readonly container: 'MP4';
  readonly fileType: 'M4A' | 'M4B' | 'M4P' | 'UnknownFileType';
}

export interface WavMetadata extends CommonMetadata {
  readonly container: 'WAV';
  readonly fileType: 'WAV';
}

export interface DsfMetadata extends CommonMetadata {
  readonly container: 'DSF';
  readonly fileType: 'DSF';
}

export type Metadata = Mp3Metadata | FlacMetadata | OggMetadata | Mp4Metadata | WavMetadata | DsfMetadata;

/**
 * Empty tag fields, used by containers without any tag region
 * @returns Tag fields with nothing but an empty raw map
 */
export function emptyTagFields(): TagFields {
  return { raw: {} };
}

/**
 * Merge tag fields, later ones win for the fields they set
 * @param fields Tag fields in order of precedence, lowest first
 * @returns The merged tag fields
 */
export function mergeTagFields(...fields: TagFields[]): TagFields {
  const last = <K extends Exclude<keyof TagFields, 'raw'>>(key: K): TagFields[K] => {
    for (let i = fields.length - 1; i >= 0; i--) {
      const value = fields[i][key];
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };
  return {
    format: last('format'),
    title: last('title'),
    album: last('album'),
    artist: last('artist'),
    albumArtist: last('albumArtist'),
    composer: last('composer'),
    genre: last('genre'),
    comment: last('comment'),
    lyrics: last('lyrics'),
    year: last('year'),
    track: last('track'),
    disc: last('disc'),
    picture: last('picture'),
    raw: Object.fromEntries(fields.flatMap((f) => Object.entries(f.raw))),
  };
}

type ContainerAndFileType =
  | Pick<Mp3Metadata, 'container' | 'fileType'>
  | Pick<FlacMetadata, 'container' | 'fileType'>
  | Pick<OggMetadata, 'container' | 'fileType'>
  | Pick<Mp4Metadata, 'container' | 'fileType'>
  | Pick<WavMetadata, 'container' | 'fileType'>
  | Pick<DsfMetadata, 'container' | 'fileType'>;

export interface MetadataInput {
  format: TagFormat;
  tags: TagFields;
  durationInSeconds: number;
  /**
   * Technical fields of the container, they take precedence over raw tag values with the same key
   */
  raw?: Record<string, RawValue>;
}

/**
 * Build an immutable metadata object. Fields the tags don't have are set to their zero values.
 * @param kind Container and file type of the variant
 * @param input Format, decoded tags, duration and technical fields
 * @returns The frozen metadata
 */
export function createMetadata<K extends ContainerAndFileType>(kind: K, input: MetadataInput): Readonly<Omit<CommonMetadata, 'fileType'> & K> {
  const { tags } = input;
  const common: Omit<CommonMetadata, 'fileType'> = {
    format: input.format,
    title: tags.title ?? '',
    album: tags.album ?? '',
    artist: tags.artist ?? '',
    albumArtist: tags.albumArtist ?? '',
    composer: tags.composer ?? '',
    genre: tags.genre ?? '',
    comment: tags.comment ?? '',
    lyrics: tags.lyrics ?? '',
    year: tags.year ?? 0,
    track: Object.freeze({ ...(tags.track ?? { current: 0, total: 0 }) }),
    disc: Object.freeze({ ...(tags.disc ?? { current: 0, total: 0 }) }),
    picture: tags.picture ? Object.freeze({ ...tags.picture }) : null,
    durationInSeconds: Number.isFinite(input.durationInSeconds) ? input.durationInSeconds : 0,
    raw: Object.freeze({ ...tags.raw, ...input.raw }),
  };
  return Object.freeze<Omit<CommonMetadata, 'fileType'> & K>({ ...common, ...kind });
}
