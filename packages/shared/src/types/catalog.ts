// Capabilities the curation layer consumes from a music catalog

import type { ArtistMatch } from './artist';
import type { AudioFeatures, TopTrack } from './track';

export interface ArtistCatalog {
  /** Best single match for a free-text artist name, or null when nothing matched */
  searchArtist(name: string): Promise<ArtistMatch | null>;
}

export interface TrackCatalog {
  /** Provider-ranked top tracks */
  getArtistTopTracks(artistId: string): Promise<TopTrack[]>;
  /** Null when the track has no musical features (e.g. spoken word, ambient noise) */
  getAudioFeatures(trackId: string): Promise<AudioFeatures | null>;
}

export type PlaylistVisibility = 'public' | 'private';

export interface PlaylistDetails {
  name: string;
  visibility: PlaylistVisibility;
  description: string;
}

export interface PlaylistRef {
  id: string;
  uri: string;
  url: string;
}

export interface PlaylistWriter {
  createPlaylist(owner: string, details: PlaylistDetails): Promise<PlaylistRef>;
  /** Accepts at most 100 item URIs per call */
  addItems(playlistId: string, uris: string[]): Promise<void>;
}
