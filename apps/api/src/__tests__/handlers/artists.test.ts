// Artist resolve endpoint tests

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApp } from '../../index';
import { createCatalog, postJson } from '../utils/fakes';

describe('POST /api/v1/artists/resolve', () => {
  const app = createApp({ catalog: createCatalog() });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves names to normalized artist records', async () => {
    const res = await app.request('/api/v1/artists/resolve', postJson({ names: ['odesza'] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        artists: [
          {
            id: 'a-odesza',
            name: 'ODESZA',
            genres: ['Indietronica', 'EDM'],
            popularity: 70,
            imageUrl: 'https://i.scdn.co/image/small',
          },
        ],
        warnings: [],
      },
    });
  });

  it('reports spelling mismatches as warnings', async () => {
    const res = await app.request('/api/v1/artists/resolve', postJson({ names: ['tiesto'] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { warnings: [{ query: 'tiesto', resolvedName: 'Tiësto', artistId: 'a-tiesto' }] },
    });
  });

  it('returns 404 for a name the catalog cannot find', async () => {
    const res = await app.request('/api/v1/artists/resolve', postJson({ names: ['odesza', 'nobody'] }));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { message: 'Could not resolve artist: nobody', code: 'ARTIST_NOT_FOUND', details: { query: 'nobody' } },
    });
  });

  it('rejects a missing names list', async () => {
    const res = await app.request('/api/v1/artists/resolve', postJson({}));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        message: 'names must be a non-empty array of strings',
        code: 'VALIDATION_ERROR',
        details: { field: 'names' },
      },
    });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await app.request('/api/v1/artists/resolve', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: 'not json',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'Request body must be valid JSON', code: 'VALIDATION_ERROR' },
    });
  });
});
