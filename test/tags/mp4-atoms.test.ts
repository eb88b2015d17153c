import { describe, expect, it } from '@jest/globals';

import { decodeMp4Atoms, readAtomHeader } from '../../src/tags/mp4-atoms';
import { FormatMismatchError } from '../../src/utils';
import { atom, bytes, dataAtom, readerOf, textAtom, u32be } from '../test-utils';

describe('MP4 atom decoder', () => {
  it('should decode text, number and picture atoms', async () => {
    const png = bytes([0x89], 'PNG');
    const ilst = bytes(
      textAtom('©nam', 'Name'),
      textAtom('©alb', 'Album'),
      textAtom('aART', 'Album Artist'),
      textAtom('©wrt', 'Writer'),
      textAtom('©gen', 'Custom Genre'),
      atom('gnre', dataAtom(0, [0, 1])),
      textAtom('©day', '2011-11-11T00:00:00Z'),
      textAtom('©cmt', 'Comment'),
      textAtom('©lyr', 'Lyrics'),
      atom('disk', dataAtom(0, [0, 0, 0, 1, 0, 2])),
      atom('covr', dataAtom(14, png)),
      atom('cpil', dataAtom(21, [1])),
      textAtom('©too', 'Encoder'),
    );

    expect(await decodeMp4Atoms(readerOf(ilst))).toEqual({
      format: 'MP4',
      title: 'Name',
      album: 'Album',
      albumArtist: 'Album Artist',
      composer: 'Writer',
      genre: 'Custom Genre',
      year: 2011,
      comment: 'Comment',
      lyrics: 'Lyrics',
      disc: { current: 1, total: 2 },
      picture: { mimeType: 'image/png', type: 3, description: '', data: png },
      raw: {
        '©nam': 'Name',
        '©alb': 'Album',
        aART: 'Album Artist',
        '©wrt': 'Writer',
        '©gen': 'Custom Genre',
        '©day': '2011-11-11T00:00:00Z',
        '©cmt': 'Comment',
        '©lyr': 'Lyrics',
        cpil: new Uint8Array([1]),
        '©too': 'Encoder',
      },
    });
  });

  it('should fall back to the numeric genre', async () => {
    const fields = await decodeMp4Atoms(readerOf(atom('gnre', dataAtom(0, [0, 14]))));
    expect(fields.genre).toBe('Pop');
  });

  it('should skip atoms without a data atom and freeform atoms', async () => {
    const ilst = bytes(atom('----', atom('mean', 'com.example'), atom('name', 'key'), dataAtom(1, 'value')), atom('©nam', atom('itif', u32be(1))));
    expect(await decodeMp4Atoms(readerOf(ilst))).toEqual({ format: 'MP4', raw: {} });
  });

  it('should use the first data atom', async () => {
    const fields = await decodeMp4Atoms(readerOf(atom('©ART', dataAtom(1, 'One'), dataAtom(1, 'Two'))));
    expect(fields.artist).toBe('One');
  });
});

describe('readAtomHeader', () => {
  it('should read the type and payload size', async () => {
    const reader = readerOf(atom('free', new Uint8Array(12)));
    expect(await readAtomHeader(reader, 20)).toEqual({ type: 'free', size: 12 });
    expect(reader.tell()).toBe(8);
  });

  it('should extend an atom of size 0 to the end', async () => {
    expect(await readAtomHeader(readerOf(bytes(u32be(0), 'mdat', new Uint8Array(30))), 38)).toEqual({ type: 'mdat', size: 30 });
  });

  it('should read a 64-bit size', async () => {
    const reader = readerOf(bytes(u32be(1), 'mdat', u32be(0), u32be(28), new Uint8Array(12)));
    expect(await readAtomHeader(reader, 28)).toEqual({ type: 'mdat', size: 12 });
    expect(reader.tell()).toBe(16);
  });

  it('should reject sizes smaller than the header or beyond the parent', async () => {
    await expect(readAtomHeader(readerOf(bytes(u32be(1), 'mdat', new Uint8Array(8))), 16)).rejects.toThrow(FormatMismatchError);
    await expect(readAtomHeader(readerOf(bytes(u32be(1), 'mdat', u32be(1), u32be(0), new Uint8Array(8))), 24)).rejects.toThrow(FormatMismatchError);
    await expect(readAtomHeader(readerOf(bytes(u32be(100), 'free', new Uint8Array(8))), 16)).rejects.toThrow(FormatMismatchError);
    await expect(readAtomHeader(readerOf(bytes(u32be(4), 'free', new Uint8Array(8))), 16)).rejects.toThrow(FormatMismatchError);
  });
});
