// Track API routes:
// POST /api/v1/tracks/curate - Run a track table through the curation pipeline

import { Hono } from 'hono';
import { curateTracks } from '@festlist/curation';
import type { AppEnv } from '../../types';
import { optionalNonNegativeInt, parseTrackRows, readJsonBody } from '../../utils/validation';

const app = new Hono<AppEnv>();

app.post('/curate', async (c) => {
  const body = await readJsonBody(c);
  const tracks = parseTrackRows(body, 'tracks');

  const result = curateTracks(tracks, {
    floorPct: optionalNonNegativeInt(body, 'floorPct'),
    minTracks: optionalNonNegativeInt(body, 'minTracks'),
  });

  return c.json({ data: result });
});

export const trackRoutes = app;
