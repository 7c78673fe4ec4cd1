// Shared type definitions for the Hono application
// Used across all route handlers to ensure type consistency

import type { ArtistCatalog, PlaylistWriter, TrackCatalog } from '@festlist/shared';

// Services handed to createApp; the server wires SpotifyService into all three
export interface AppServices {
  catalog: ArtistCatalog & TrackCatalog;
  writer?: PlaylistWriter;
  /** Spotify user that owns published playlists */
  playlistOwner?: string;
  environment?: string;
}

// Context variables (set by middleware)
export type Variables = {
  catalog: ArtistCatalog & TrackCatalog;
  writer: PlaylistWriter | null;
  playlistOwner: string | null;
};

export type AppEnv = { Variables: Variables };
