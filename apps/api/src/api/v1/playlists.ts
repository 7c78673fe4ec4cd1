// Playlist API routes:
// POST /api/v1/playlists - Build a curated playlist from lineup picks and new names,
// optionally publishing it to Spotify

import { Hono } from 'hono';
import { buildPlaylist, type PublishRequest } from '@festlist/curation';
import { ValidationError } from '@festlist/shared';
import type { AppEnv } from '../../types';
import {
  optionalBoolean,
  optionalEnum,
  optionalNonNegativeInt,
  optionalString,
  optionalStringArray,
  parseArtistRecords,
  readJsonBody,
  requireString,
} from '../../utils/validation';

const app = new Hono<AppEnv>();

app.post('/', async (c) => {
  const body = await readJsonBody(c);
  const name = requireString(body, 'name');
  const shouldPublish = optionalBoolean(body, 'publish') ?? false;

  let publish: PublishRequest | undefined;
  if (shouldPublish) {
    const owner = c.get('playlistOwner');
    if (!owner) {
      throw new ValidationError('Publishing requires SPOTIFY_USER to be configured');
    }
    publish = {
      owner,
      name,
      visibility: optionalEnum(body, 'visibility', ['public', 'private'] as const),
      description: optionalString(body, 'description'),
    };
  }

  const writer = c.get('writer');
  const result = await buildPlaylist(
    { catalog: c.get('catalog'), writer: writer ?? undefined },
    {
      selectedNames: optionalStringArray(body, 'selectedNames'),
      lineup: parseArtistRecords(body, 'lineup'),
      newArtistNames: optionalStringArray(body, 'newArtists'),
      tracksPerArtist: optionalNonNegativeInt(body, 'tracksPerArtist'),
      onArtistFailure: optionalEnum(body, 'onArtistFailure', ['abort', 'skip'] as const),
      publish,
    }
  );

  return c.json({
    data: {
      name,
      artists: result.artists,
      collectedCount: result.collectedCount,
      tracks: result.tracks,
      report: result.report,
      warnings: result.warnings,
      skipped: result.skipped,
      playlist: result.published?.playlist ?? null,
      batchCount: result.published?.batchCount ?? 0,
    },
  });
});

export const playlistRoutes = app;
