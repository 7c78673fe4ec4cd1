// ABOUTME: Track Collector - builds the curation table from each artist's top tracks.
// ABOUTME: Rows carry a copy of their artist; missing audio features stay null.

import { CURATION_CONFIG } from '@festlist/config';
import {
  ValidationError,
  mapWithConcurrency,
  type ArtistRecord,
  type TrackCatalog,
  type TrackRow,
} from '@festlist/shared';

export interface CollectOptions {
  tracksPerArtist?: number;
  /** Artists fetched in parallel; row order always follows artist input order */
  concurrency?: number;
}

function assertTrackCount(tracksPerArtist: number): void {
  if (!Number.isInteger(tracksPerArtist) || tracksPerArtist < 0) {
    throw new ValidationError(`tracksPerArtist must be a non-negative integer, got ${tracksPerArtist}`);
  }
}

/**
 * All rows for one artist. Nothing is returned until every track of the
 * artist has been fetched, so a failure never leaves a partial artist behind.
 */
export async function collectArtistTracks(
  catalog: TrackCatalog,
  artist: ArtistRecord,
  tracksPerArtist: number = CURATION_CONFIG.tracksPerArtist
): Promise<TrackRow[]> {
  assertTrackCount(tracksPerArtist);

  const topTracks = (await catalog.getArtistTopTracks(artist.id)).slice(0, tracksPerArtist);
  const rows: TrackRow[] = [];

  for (const track of topTracks) {
    const features = await catalog.getAudioFeatures(track.id);
    if (!features) {
      console.log(`[Collector] No audio features for "${track.name}" by ${artist.name}`);
    }

    rows.push({
      title: track.name,
      trackId: track.id,
      trackPopularity: track.popularity,
      danceability: features?.danceability ?? null,
      energy: features?.energy ?? null,
      tempo: features?.tempo ?? null,
      speechiness: features?.speechiness ?? null,
      artistName: artist.name,
      artistId: artist.id,
      artistGenres: [...artist.genres],
      artistPopularity: artist.popularity,
      artistImageUrl: artist.imageUrl,
    });
  }

  return rows;
}

export async function collectTracks(
  catalog: TrackCatalog,
  artists: readonly ArtistRecord[],
  options: CollectOptions = {}
): Promise<TrackRow[]> {
  const tracksPerArtist = options.tracksPerArtist ?? CURATION_CONFIG.tracksPerArtist;
  const concurrency = options.concurrency ?? CURATION_CONFIG.collectConcurrency;
  assertTrackCount(tracksPerArtist);

  const perArtist = await mapWithConcurrency(artists, concurrency, (artist) =>
    collectArtistTracks(catalog, artist, tracksPerArtist)
  );

  const rows = perArtist.flat();
  console.log(`[Collector] Collected ${rows.length} tracks from ${artists.length} artists`);
  return rows;
}
