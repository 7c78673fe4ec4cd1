// API Routes Index
// Provides the /api overview endpoint and exports all route groups

import { Hono } from 'hono';
import { SITE_CONFIG } from '@festlist/config';
import type { AppEnv } from '../types';
import { v1Routes } from './v1';

const app = new Hono<AppEnv>();

// API routes overview
app.get('/', (c) => {
  return c.json({
    message: `${SITE_CONFIG.name} API`,
    version: '1.0.0',
    endpoints: {
      v1: {
        resolveArtists: {
          description: 'Resolve artist names against the Spotify catalog',
          endpoint: 'POST /api/v1/artists/resolve',
          body: '{ "names": ["artist", ...] }',
        },
        curateTracks: {
          description: 'Deduplicate, collapse versions and trim a track table',
          endpoint: 'POST /api/v1/tracks/curate',
          body: '{ "tracks": [TrackRow, ...] }',
        },
        buildPlaylist: {
          description: 'Build a curated playlist, optionally publishing it',
          endpoint: 'POST /api/v1/playlists',
          body: '{ "name": "...", "selectedNames": [], "lineup": [], "newArtists": [], "publish": false }',
        },
      },
      other: {
        health: '/health',
      },
    },
  });
});

app.route('/v1', v1Routes);

export const apiRoutes = app;
