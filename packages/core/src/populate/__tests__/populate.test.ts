import { describe, it, expect } from 'vitest';

import { createForm } from '../../api.js';
import { defineSchema } from '../../definition/builder.js';
import {
  MissingNestedModelError,
  PopulationError,
} from '../../types/errors.js';
import type { CreationContext } from '../../types/schema.js';
import { populate } from '../populate.js';

class TrackModel {
  title = 'untitled';
}

class LabelModel {
  name = 'none';
}

const track = defineSchema('Track').property('title').build();
const label = defineSchema('Label').property('name').build();

function tracksOf(titles: string[]): { title: string }[] {
  return titles.map((title) => ({ title }));
}

describe('populate: scalars', () => {
  const album = defineSchema('Album')
    .property('title')
    .property('year')
    .property('slug', { visibility: 'virtual' })
    .build();

  it('overwrites given keys only and never touches the model', () => {
    const model = { title: 'Old', year: 1999, slug: 'old' };
    const form = createForm(album, model);

    populate(form, { title: 'New', slug: 'ignored' });

    expect(form.get('title')).toBe('New');
    expect(form.get('year')).toBe(1999);
    expect(form.get('slug')).toBe('old');
    expect(form.changedProperties()).toEqual(['title']);
    expect(model).toEqual({ title: 'Old', year: 1999, slug: 'old' });
  });

  it('runs the transform before assigning', () => {
    const definition = defineSchema('Counter')
      .property('label', {
        transform: (value, { previous }) => `${String(previous)}+${String(value)}`,
      })
      .build();
    const form = createForm(definition, { label: 'a' });

    populate(form, { label: 'b' });

    expect(form.get('label')).toBe('a+b');
  });

  it('does not mark unchanged values', () => {
    const form = createForm(album, { title: 'Same', year: 1, slug: 's' });
    populate(form, { title: 'Same' });
    expect(form.changed('title')).toBe(false);
  });

  it('rejects input that is not a mapping', () => {
    const form = createForm(album, { title: 'x', year: 1, slug: 's' });
    expect(() => populate(form, 'title=x')).toThrow(
      'Expected a mapping at <root> (got string)'
    );
    expect(() => populate(form, [])).toThrow(PopulationError);
  });
});

describe('populate: nested', () => {
  const album = defineSchema('Album')
    .nested('label', { schema: label, create: LabelModel })
    .build();

  it('recurses into an existing child', () => {
    const existing = { name: 'EMI' };
    const form = createForm(album, { label: existing });
    const child = form.child('label');

    const { notes } = populate(form, { label: { name: 'Sony' } });

    expect(form.child('label')).toBe(child);
    expect(form.child('label')?.get('name')).toBe('Sony');
    expect(form.changed('label')).toBe(false);
    expect(notes).toEqual([]);
    expect(existing.name).toBe('EMI');
  });

  it('creates a missing child through its creation policy', () => {
    const form = createForm(album, { label: null });

    const { notes } = populate(form, { label: { name: 'Sony' } });

    const child = form.child('label');
    expect(child?.model).toBeInstanceOf(LabelModel);
    expect(child?.get('name')).toBe('Sony');
    expect(child?.parent).toBe(form);
    expect(form.changed('label')).toBe(true);
    expect(notes).toEqual([
      { code: 'CHILD_CREATED', path: 'label', details: { definition: 'Label' } },
    ]);
  });

  it('leaves the child alone when the key is null', () => {
    const form = createForm(album, { label: null });
    populate(form, { label: null });
    expect(form.child('label')).toBeUndefined();
  });

  it('fails without a creation policy', () => {
    const strict = defineSchema('Album')
      .property('title')
      .nested('label', { schema: label })
      .build();
    const form = createForm(strict, { title: 'Old', label: null });

    expect(() =>
      populate(form, { title: 'New', label: { name: 'Sony' } })
    ).toThrow(MissingNestedModelError);
    expect(form.get('title')).toBe('Old');
  });
});

describe('populate: collections', () => {
  it('aligns positionally and creates entries past the end', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track, create: TrackModel })
      .build();
    const form = createForm(album, { tracks: tracksOf(['a', 'b']) });
    const [first, second] = form.children('tracks');

    populate(form, { tracks: tracksOf(['A', 'B', 'C']) });

    const children = form.children('tracks');
    expect(children).toHaveLength(3);
    expect(children[0]).toBe(first);
    expect(children[1]).toBe(second);
    expect(children[2]?.model).toBeInstanceOf(TrackModel);
    expect(children[2]?.path).toBe('tracks[2]');
    expect(children.map((c) => c.get('title'))).toEqual(['A', 'B', 'C']);
    expect(form.changed('tracks')).toBe(true);
  });

  it('hands the fragment and its context to createWith', () => {
    const seen: { fragment: unknown; context: CreationContext }[] = [];
    const album = defineSchema('Album')
      .collection('tracks', {
        schema: track,
        createWith: (fragment, context) => {
          seen.push({ fragment, context });
          return { title: null };
        },
      })
      .build();
    const form = createForm(album, { tracks: [] });

    populate(form, { tracks: [{ title: 'Intro' }] });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.fragment).toEqual({ title: 'Intro' });
    expect(seen[0]?.context.parent).toBe(form);
    expect(seen[0]?.context.definition).toBe(track);
    expect(seen[0]?.context.index).toBe(0);
    expect(seen[0]?.context.path).toBe('tracks[0]');
  });

  it('checks the whole input before changing anything', () => {
    const album = defineSchema('Album')
      .property('title')
      .collection('tracks', { schema: track })
      .build();
    const form = createForm(album, {
      title: 'Old',
      tracks: tracksOf(['a']),
    });

    expect(() =>
      populate(form, { title: 'New', tracks: tracksOf(['A', 'B']) })
    ).toThrow('No Track model at tracks[1] and "tracks" has no creation policy');
    expect(form.get('title')).toBe('Old');
    expect(form.children('tracks')[0]?.get('title')).toBe('a');
  });

  it('rejects malformed entries and non-list values', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track, create: TrackModel })
      .build();
    const form = createForm(album, { tracks: [] });

    expect(() => populate(form, { tracks: [1] })).toThrow(
      'Expected a mapping at tracks[0] (got number)'
    );
    expect(() => populate(form, { tracks: 'abc' })).toThrow(
      'Expected a list at tracks (got string)'
    );
  });

  it('accepts mappings keyed by index, ordered by index', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track, create: TrackModel })
      .build();
    const form = createForm(album, { tracks: [] });

    populate(form, {
      tracks: { '1': { title: 'second' }, '0': { title: 'first' } },
    });

    expect(form.children('tracks').map((c) => c.get('title'))).toEqual([
      'first',
      'second',
    ]);

    const strict = createForm(
      album,
      { tracks: [] },
      { input: { indexedMappings: false } }
    );
    expect(() =>
      populate(strict, { tracks: { '0': { title: 'first' } } })
    ).toThrow(PopulationError);
  });

  it('skips blank entries when skipIf is allBlank', () => {
    const album = defineSchema('Album')
      .collection('tracks', {
        schema: track,
        create: TrackModel,
        skipIf: 'allBlank',
      })
      .build();
    const form = createForm(album, { tracks: tracksOf(['kept']) });

    const { notes } = populate(form, {
      tracks: [{ title: '  ' }, { title: null }, { title: 'new' }],
    });

    // the skipped gap at [1] is not created, so later entries close up
    expect(form.children('tracks').map((c) => c.get('title'))).toEqual([
      'kept',
      'new',
    ]);
    expect(notes.map((n) => `${n.code} ${n.path}`)).toEqual([
      'ENTRY_SKIPPED tracks[0]',
      'ENTRY_SKIPPED tracks[1]',
      'CHILD_CREATED tracks[2]',
    ]);
  });

  it('traces created entries when tracing is on', () => {
    const lines: string[] = [];
    const album = defineSchema('Album')
      .collection('tracks', { schema: track, create: TrackModel })
      .build();
    const form = createForm(
      album,
      { tracks: [] },
      { trace: true, traceSink: (line) => lines.push(line) }
    );

    populate(form, { tracks: tracksOf(['x']) });

    expect(lines).toEqual(['[modelform] populate tracks[0]: created Track']);
  });
});

describe('populate: surplus entries', () => {
  const withModels = () => ({ tracks: tracksOf(['a', 'b', 'c']) });

  it('keeps them by default', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track })
      .build();
    const form = createForm(album, withModels());

    const { notes } = populate(form, { tracks: tracksOf(['A']) });

    expect(form.children('tracks').map((c) => c.get('title'))).toEqual([
      'A',
      'b',
      'c',
    ]);
    expect(notes).toEqual([
      { code: 'SURPLUS_KEPT', path: 'tracks', details: { count: 2 } },
    ]);
    expect(form.changed('tracks')).toBe(false);
  });

  it('drops them when the option says so', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track })
      .build();
    const form = createForm(album, withModels(), {
      collections: { surplus: 'drop' },
    });

    const { notes } = populate(form, { tracks: tracksOf(['A']) });

    expect(form.children('tracks').map((c) => c.get('title'))).toEqual(['A']);
    expect(notes[0]?.code).toBe('SURPLUS_DROPPED');
    expect(form.changed('tracks')).toBe(true);
  });

  it('flags them for validation with a per-property policy', () => {
    const album = defineSchema('Album')
      .collection('tracks', { schema: track, surplus: 'invalid' })
      .build();
    const form = createForm(album, withModels());

    expect(form.validate({ tracks: tracksOf(['A']) })).toBe(false);
    expect(form.children('tracks')).toHaveLength(3);
    expect(form.surplusCount('tracks')).toBe(2);
    expect(form.messages()).toEqual({
      tracks: ['has 2 entries missing from the input'],
    });

    expect(form.validate({ tracks: tracksOf(['A', 'B', 'C']) })).toBe(true);
    expect(form.surplusCount('tracks')).toBe(0);
  });
});

describe('populate: creation policies', () => {
  const composer = defineSchema('Composer').property('name').build();
  const song = defineSchema('Song')
    .property('id')
    .property('title')
    .nested('composer', { schema: composer })
    .build();

  it('populates a looked-up model through the children it already holds', () => {
    const known = { id: 7, title: 'Known', composer: { name: 'Old' } };
    let calls = 0;
    const album = defineSchema('Album')
      .collection('songs', {
        schema: song,
        createWith: () => {
          calls += 1;
          return known;
        },
      })
      .build();
    const form = createForm(album, { songs: [] });

    populate(form, {
      songs: [{ id: 7, title: 'Renamed', composer: { name: 'New' } }],
    });

    const [entry] = form.children('songs');
    expect(calls).toBe(1);
    expect(entry?.model).toBe(known);
    expect(entry?.get('title')).toBe('Renamed');
    expect(entry?.child('composer')?.get('name')).toBe('New');
    expect(known).toEqual({ id: 7, title: 'Known', composer: { name: 'Old' } });
  });

  it('rejects a created model whose list accessor holds no list, before assigning', () => {
    const tag = defineSchema('Tag').property('label').build();
    const tagged = defineSchema('Track')
      .property('title')
      .collection('tags', { schema: tag })
      .build();
    const album = defineSchema('Album')
      .property('title')
      .collection('tracks', {
        schema: tagged,
        createWith: () => ({ title: null, tags: 'not-a-list' }),
      })
      .build();
    const form = createForm(album, { title: 'Before', tracks: [] });

    expect(() =>
      populate(form, { title: 'After', tracks: [{ title: 'x' }] })
    ).toThrow(PopulationError);
    expect(form.get('title')).toBe('Before');
    expect(form.children('tracks')).toEqual([]);
  });

  it('rejects a policy that returns no model, before assigning', () => {
    const album = defineSchema('Album')
      .property('title')
      .nested('label', { schema: label, createWith: () => null })
      .build();
    const form = createForm(album, { title: 'Before', label: null });

    expect(() =>
      populate(form, { title: 'After', label: { name: 'Sony' } })
    ).toThrow('The creation policy of "label" returned no model for label');
    expect(form.get('title')).toBe('Before');
    expect(form.child('label')).toBeUndefined();
  });

  it('suggests a creation policy when none is declared', () => {
    const album = defineSchema('Album')
      .nested('label', { schema: label })
      .build();
    const form = createForm(album, { label: null });

    let caught: unknown;
    try {
      populate(form, { label: { name: 'Sony' } });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingNestedModelError);
    if (caught instanceof MissingNestedModelError) {
      expect(caught.context?.suggestion).toBe(
        'Give "label" a create or createWith policy, or supply the Label model'
      );
    }
  });
});
