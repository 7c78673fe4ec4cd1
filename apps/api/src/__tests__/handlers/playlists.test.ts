// Playlist build endpoint tests

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApp } from '../../index';
import { FakeWriter, createCatalog, postJson } from '../utils/fakes';

describe('POST /api/v1/playlists', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds a curated track list without publishing', async () => {
    const app = createApp({ catalog: createCatalog() });
    const res = await app.request('/api/v1/playlists', postJson({ name: 'Weekend', newArtists: ['odesza', 'tiesto'] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        name: 'Weekend',
        collectedCount: 3,
        tracks: [{ title: 'Say My Name' }, { title: 'The Business' }],
        report: { duplicates: [], versions: ['Say My Name - Remix'], trimmed: [] },
        warnings: [{ query: 'tiesto', resolvedName: 'Tiësto', artistId: 'a-tiesto' }],
        skipped: [],
        playlist: null,
        batchCount: 0,
      },
    });
  });

  it('filters the lineup to the selected names', async () => {
    const app = createApp({ catalog: createCatalog() });
    const lineup = [
      { id: 'a-odesza', name: 'ODESZA', genres: [], popularity: 70, imageUrl: null },
      { id: 'a-tiesto', name: 'Tiësto', genres: [], popularity: 80, imageUrl: null },
    ];
    const res = await app.request('/api/v1/playlists', postJson({ name: 'Picks', lineup, selectedNames: ['Tiësto'] }));

    expect(await res.json()).toMatchObject({ data: { artists: [{ name: 'Tiësto' }] } });
  });

  it('publishes to the configured owner', async () => {
    const writer = new FakeWriter();
    const app = createApp({ catalog: createCatalog(), writer, playlistOwner: 'festival-bot' });

    const res = await app.request(
      '/api/v1/playlists',
      postJson({ name: 'Weekend', newArtists: ['odesza', 'tiesto'], publish: true, visibility: 'private' })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { playlist: { id: 'playlist-1' }, batchCount: 1 } });
    expect(writer.created).toEqual([
      { owner: 'festival-bot', details: { name: 'Weekend', visibility: 'private', description: 'Created with Festlist.' } },
    ]);
    expect(writer.batches).toEqual([['spotify:track:o1', 'spotify:track:t1']]);
  });

  it('requires an owner to publish', async () => {
    const app = createApp({ catalog: createCatalog(), writer: new FakeWriter() });
    const res = await app.request('/api/v1/playlists', postJson({ name: 'Weekend', newArtists: ['odesza'], publish: true }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'Publishing requires SPOTIFY_USER to be configured', code: 'VALIDATION_ERROR' },
    });
  });

  it('rejects an unknown visibility', async () => {
    const app = createApp({ catalog: createCatalog(), writer: new FakeWriter(), playlistOwner: 'festival-bot' });
    const res = await app.request(
      '/api/v1/playlists',
      postJson({ name: 'Weekend', newArtists: ['odesza'], publish: true, visibility: 'secret' })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'visibility must be one of: public, private' } });
  });

  it('skips unresolvable names when asked', async () => {
    const app = createApp({ catalog: createCatalog() });
    const res = await app.request(
      '/api/v1/playlists',
      postJson({ name: 'Weekend', newArtists: ['nobody', 'odesza'], onArtistFailure: 'skip' })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        skipped: [{ name: 'nobody', stage: 'resolve', code: 'ARTIST_NOT_FOUND', message: 'Could not resolve artist: nobody' }],
      },
    });
  });

  it('rejects a request with no artists', async () => {
    const app = createApp({ catalog: createCatalog() });
    const res = await app.request('/api/v1/playlists', postJson({ name: 'Empty' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'No artists to build a playlist from' } });
  });
});
