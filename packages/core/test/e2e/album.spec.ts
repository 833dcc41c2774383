import { describe, expect, it } from 'vitest';

import {
  createForm,
  defineSchema,
  type ErrorMessages,
  rules,
  type SchemaDefinition,
} from '../../src/index.js';
import { Album, Song, type SaveLog } from '../fixtures/models.js';

function albumDefinition(log: SaveLog): SchemaDefinition {
  const song = defineSchema('Song')
    .property('title')
    .rules(
      rules((values): ErrorMessages =>
        typeof values.title === 'string' && values.title.trim() !== ''
          ? {}
          : { title: ['is required'] }
      )
    )
    .build();

  return defineSchema('Album')
    .property('title')
    .collection('songs', {
      schema: song,
      createWith: () => new Song('', log),
    })
    .build();
}

describe('album with songs', () => {
  it('populates, validates and saves children before the parent', () => {
    const log: SaveLog = [];
    const original = new Song('Old', log);
    const album = new Album('Draft', [original], log);
    const form = createForm(albumDefinition(log), album);

    const valid = form.validate({
      title: 'Rio',
      songs: [{ title: 'A' }, { title: 'B' }],
    });

    expect(valid).toBe(true);
    expect(form.messages()).toEqual({});
    // validating never writes the models
    expect(album.title).toBe('Draft');
    expect(album.songs).toEqual([original]);
    expect(original.title).toBe('Old');

    form.save();

    expect(log).toEqual(['song:A', 'song:B', 'album:Rio']);
    expect(album.songs).toHaveLength(2);
    expect(album.songs[0]).toBe(original);
    expect(album.songs[1]).toBeInstanceOf(Song);
    expect(album.songs[1]?.title).toBe('B');
  });

  it('reports a blank song title under its indexed path', () => {
    const log: SaveLog = [];
    const album = new Album('Draft', [new Song('Old', log)], log);
    const form = createForm(albumDefinition(log), album);

    const valid = form.validate({ title: 'Rio', songs: [{ title: '' }] });

    expect(valid).toBe(false);
    expect(form.messages()).toEqual({ 'songs[0].title': ['is required'] });
    expect(log).toEqual([]);
  });
});
