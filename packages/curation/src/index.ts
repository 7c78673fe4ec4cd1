// Curation - lineup artists in, curated playlist out

export { normalizeGenre, normalizeGenres } from './genre';

export { resolveArtist, resolveArtists } from './resolver';
export type { ResolveOptions } from './resolver';

export { collectArtistTracks, collectTracks } from './collector';
export type { CollectOptions } from './collector';

export * from './pipeline';

export { combineArtists } from './combiner';

export { publishPlaylist, trackUri } from './publisher';
export type { PublishOptions, PublishRequest, PublishResult } from './publisher';

export { buildPlaylist } from './builder';
export type {
  ArtistFailureMode,
  BuildRequest,
  BuildResult,
  BuildServices,
  SkippedArtist,
} from './builder';
