// Artist API routes:
// POST /api/v1/artists/resolve - Resolve free-text names to catalog artists

import { Hono } from 'hono';
import { resolveArtists } from '@festlist/curation';
import type { ResolutionMismatch } from '@festlist/shared';
import type { AppEnv } from '../../types';
import { readJsonBody, requireStringArray } from '../../utils/validation';

const app = new Hono<AppEnv>();

app.post('/resolve', async (c) => {
  const body = await readJsonBody(c);
  const names = requireStringArray(body, 'names');

  const warnings: ResolutionMismatch[] = [];
  const artists = await resolveArtists(c.get('catalog'), names, {
    onMismatch: (mismatch) => warnings.push(mismatch),
  });

  return c.json({ data: { artists, warnings } });
});

export const artistRoutes = app;
