import { describe, expect, it } from '@jest/globals';

import { decodeId3v1Tags } from '../../src/tags/id3v1';
import { FormatMismatchError } from '../../src/utils';
import { bytes, id3v1Tag, readerOf } from '../test-utils';

describe('ID3v1 decoder', () => {
  it('should decode an ID3v1.1 tag with a track number', async () => {
    const tag = id3v1Tag({ title: 'Song Title', artist: 'The Artist', album: 'An Album', year: '1995', comment: 'Nice', track: 12, genre: 17 });
    expect(await decodeId3v1Tags(readerOf(tag))).toEqual({
      format: 'ID3v1',
      title: 'Song Title',
      artist: 'The Artist',
      album: 'An Album',
      year: 1995,
      comment: 'Nice',
      track: { current: 12, total: 0 },
      genre: 'Rock',
      raw: { genre_index: 17 },
    });
  });

  it('should decode an ID3v1.0 tag with a 30 character comment', async () => {
    const comment = 'c'.repeat(30);
    const fields = await decodeId3v1Tags(readerOf(id3v1Tag({ title: 'Padded   ', comment })));
    expect(fields.title).toBe('Padded');
    expect(fields.comment).toBe(comment);
    expect(fields.track).toBeUndefined();
    expect(fields.year).toBeUndefined();
  });

  it('should leave the genre out for an index outside the list', async () => {
    const fields = await decodeId3v1Tags(readerOf(id3v1Tag({ genre: 255 })));
    expect(fields.genre).toBeUndefined();
    expect(fields.raw).toEqual({ genre_index: 255 });
  });

  it('should reject a record without the TAG marker', async () => {
    await expect(decodeId3v1Tags(readerOf(bytes('TAX', new Uint8Array(125))))).rejects.toThrow(FormatMismatchError);
  });
});
