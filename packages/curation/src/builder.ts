// ABOUTME: End-to-end playlist build - combine, resolve, collect, curate, publish.
// ABOUTME: Artist-level failures either abort the build or are skipped and reported.

import { CURATION_CONFIG } from '@festlist/config';
import {
  AppError,
  RateLimitError,
  ValidationError,
  mapWithConcurrency,
  type ArtistCatalog,
  type ArtistRecord,
  type PlaylistWriter,
  type ResolutionMismatch,
  type TrackCatalog,
  type TrackRow,
} from '@festlist/shared';
import { combineArtists } from './combiner';
import { resolveArtist } from './resolver';
import { collectArtistTracks } from './collector';
import { curateTracks, type CurationReport } from './pipeline';
import { publishPlaylist, type PublishRequest, type PublishResult } from './publisher';

export type ArtistFailureMode = 'abort' | 'skip';

export interface BuildServices {
  catalog: ArtistCatalog & TrackCatalog;
  writer?: PlaylistWriter;
}

export interface BuildRequest {
  /** Names picked from the lineup */
  selectedNames?: readonly string[];
  /** Already resolved lineup artists */
  lineup?: readonly ArtistRecord[];
  /** Free-text names still to be resolved */
  newArtistNames?: readonly string[];
  tracksPerArtist?: number;
  onArtistFailure?: ArtistFailureMode;
  concurrency?: number;
  /** Publish the curated tracks when set */
  publish?: PublishRequest;
}

export interface SkippedArtist {
  name: string;
  stage: 'resolve' | 'collect';
  code: string;
  message: string;
}

export interface BuildResult {
  artists: ArtistRecord[];
  collectedCount: number;
  tracks: TrackRow[];
  report: CurationReport;
  warnings: ResolutionMismatch[];
  skipped: SkippedArtist[];
  published: PublishResult | null;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: AppError };

/**
 * Rate limiting that outlasted the retry cap is a request-level problem:
 * skipping would just skip every remaining artist too.
 */
function isArtistLevelFailure(error: unknown): error is AppError {
  return error instanceof AppError && !(error instanceof RateLimitError);
}

async function attempt<T>(mode: ArtistFailureMode, fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    if (mode === 'skip' && isArtistLevelFailure(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

export async function buildPlaylist(services: BuildServices, request: BuildRequest): Promise<BuildResult> {
  const mode = request.onArtistFailure ?? 'abort';
  const tracksPerArtist = request.tracksPerArtist ?? CURATION_CONFIG.tracksPerArtist;
  const concurrency = request.concurrency ?? CURATION_CONFIG.collectConcurrency;

  if (request.publish && !services.writer) {
    throw new ValidationError('Publishing requested but no playlist writer is configured');
  }

  const warnings: ResolutionMismatch[] = [];
  const skipped: SkippedArtist[] = [];

  const resolved = await mapWithConcurrency(request.newArtistNames ?? [], concurrency, (name) =>
    attempt(mode, () => resolveArtist(services.catalog, name, { onMismatch: (m) => warnings.push(m) }))
  );
  const newArtists: ArtistRecord[] = [];
  for (const [i, outcome] of resolved.entries()) {
    if (outcome.ok) {
      newArtists.push(outcome.value);
    } else {
      const name = request.newArtistNames?.[i] ?? '';
      console.error(`[Curation] Skipping "${name}": ${outcome.error.message}`);
      skipped.push({ name, stage: 'resolve', code: outcome.error.code, message: outcome.error.message });
    }
  }

  const artists = combineArtists(request.selectedNames ?? [], request.lineup ?? [], newArtists);
  if (artists.length === 0) {
    throw new ValidationError('No artists to build a playlist from');
  }

  const collected = await mapWithConcurrency(artists, concurrency, (artist) =>
    attempt(mode, () => collectArtistTracks(services.catalog, artist, tracksPerArtist))
  );
  const rows: TrackRow[] = [];
  for (const [i, outcome] of collected.entries()) {
    if (outcome.ok) {
      rows.push(...outcome.value);
    } else {
      const { name } = artists[i];
      console.error(`[Curation] Skipping tracks for ${name}: ${outcome.error.message}`);
      skipped.push({ name, stage: 'collect', code: outcome.error.code, message: outcome.error.message });
    }
  }

  const { tracks, report } = curateTracks(rows);

  const published =
    request.publish && services.writer
      ? await publishPlaylist(
          services.writer,
          request.publish,
          tracks.map((track) => track.trackId)
        )
      : null;

  return {
    artists,
    collectedCount: rows.length,
    tracks,
    report,
    warnings,
    skipped,
    published,
  };
}
