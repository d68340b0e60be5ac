import { describe, it, expect, vi, beforeEach } from 'vitest';

const { supabaseMock } = await vi.hoisted(async () => {
  const { createSupabaseMock } = await import('../helpers/supabase-mock.js');
  return { supabaseMock: createSupabaseMock() };
});

vi.mock('../../src/config/supabase.js', () => ({ supabase: supabaseMock.client }));

import { Hydrator, supabaseMetadataBackend, toFeedItem } from '../../src/services/hydration.service.js';
import { FakeMetadataBackend, MemoryMetadataCache, metadataFor } from '../helpers/fakes.js';

describe('Hydrator', () => {
  let backend: FakeMetadataBackend;
  let cache: MemoryMetadataCache;
  let hydrator: Hydrator;

  beforeEach(() => {
    backend = new FakeMetadataBackend().add(metadataFor('a'), metadataFor('b'), metadataFor('c'));
    cache = new MemoryMetadataCache();
    hydrator = new Hydrator(backend, cache);
  });

  it('should preserve the input order', async () => {
    const items = await hydrator.hydrate(['c', 'a', 'b']);

    expect(items.map((i) => i.id)).toEqual(['c', 'a', 'b']);
  });

  it('should resolve all misses in one batched lookup', async () => {
    await hydrator.hydrate(['c', 'a', 'b']);

    expect(backend.calls).toEqual([['c', 'a', 'b']]);
  });

  it('should omit ids the backend cannot resolve', async () => {
    const items = await hydrator.hydrate(['a', 'missing', 'b']);

    expect(items.map((i) => i.id)).toEqual(['a', 'b']);
  });

  it('should only look up ids missing from the cache', async () => {
    await cache.setMetadataMany([metadataFor('a')]);

    const items = await hydrator.hydrate(['a', 'b']);

    expect(items.map((i) => i.id)).toEqual(['a', 'b']);
    expect(backend.calls).toEqual([['b']]);
  });

  it('should write fetched metadata back to the cache', async () => {
    await hydrator.hydrate(['a', 'b']);

    expect([...cache.entries.keys()].sort()).toEqual(['a', 'b']);
  });

  it('should skip the backend when everything is cached', async () => {
    await hydrator.hydrate(['a']);
    await hydrator.hydrate(['a']);

    expect(backend.calls).toHaveLength(1);
  });

  it('should look up a repeated id once', async () => {
    await hydrator.hydrate(['a', 'a']);

    expect(backend.calls).toEqual([['a']]);
  });

  it('should do nothing for an empty list', async () => {
    expect(await hydrator.hydrate([])).toEqual([]);
    expect(backend.calls).toHaveLength(0);
  });

  it('should serve cached items when the backend fails', async () => {
    await cache.setMetadataMany([metadataFor('a')]);
    hydrator = new Hydrator({ batchGet: () => Promise.reject(new Error('catalog offline')) }, cache);

    const items = await hydrator.hydrate(['a', 'b']);

    expect(items.map((i) => i.id)).toEqual(['a']);
  });
});

describe('toFeedItem', () => {
  it('should use the video key as playback reference for video content', () => {
    const item = toFeedItem(metadataFor('m1', { youtubeKey: 'abc123', contentType: 'trailer' }));

    expect(item).toEqual({
      id: 'm1',
      title: 'Title m1',
      overview: null,
      posterRef: '/posters/m1.jpg',
      playbackRef: 'abc123',
      contentType: 'trailer',
      tags: ['drama'],
      releaseDate: '2025-06-01',
      rating: 7.5,
    });
  });

  it('should use the image URL as playback reference for image content', () => {
    const item = toFeedItem(
      metadataFor('m2', { contentType: 'image', imageUrl: 'https://img.example/m2.png', youtubeKey: null }),
    );

    expect(item.playbackRef).toBe('https://img.example/m2.png');
  });
});

describe('supabaseMetadataBackend', () => {
  beforeEach(() => {
    supabaseMock.reset();
  });

  it('should query only the requested ids', async () => {
    await supabaseMetadataBackend.batchGet(['m1', 'm2']);

    expect(supabaseMock.calls).toContainEqual({ table: 'content', method: 'in', args: ['id', ['m1', 'm2']] });
  });

  it('should map rows and fill defaults for missing columns', async () => {
    supabaseMock.respond('content', [
      {
        id: 'm1',
        title: null,
        overview: 'A heist',
        poster_path: '/m1.jpg',
        youtube_key: 'k1',
        image_url: null,
        content_type: null,
        genres: ['crime'],
        release_date: '2024-02-02',
        vote_average: 8.1,
      },
      { id: 'm2', title: 'Second' },
    ]);

    const found = await supabaseMetadataBackend.batchGet(['m1', 'm2']);

    expect(found.get('m1')).toEqual({
      id: 'm1',
      title: 'Untitled',
      overview: 'A heist',
      posterPath: '/m1.jpg',
      youtubeKey: 'k1',
      imageUrl: null,
      contentType: 'trailer',
      genres: ['crime'],
      releaseDate: '2024-02-02',
      voteAverage: 8.1,
    });
    expect(found.get('m2')).toEqual({
      id: 'm2',
      title: 'Second',
      overview: null,
      posterPath: null,
      youtubeKey: null,
      imageUrl: null,
      contentType: 'trailer',
      genres: [],
      releaseDate: null,
      voteAverage: null,
    });
  });

  it('should skip malformed rows', async () => {
    supabaseMock.respond('content', [{ id: 7, title: 'bad' }, { id: 'm3', title: 'Good' }]);

    const found = await supabaseMetadataBackend.batchGet(['m3']);

    expect([...found.keys()]).toEqual(['m3']);
  });

  it('should reject on a query error', async () => {
    supabaseMock.respond('content', null, { message: 'timeout' });

    await expect(supabaseMetadataBackend.batchGet(['m1'])).rejects.toMatchObject({ message: 'timeout' });
  });
});
