// Spotify service - consolidated API client for Spotify

import type {
  ArtistCatalog,
  ArtistMatch,
  AudioFeatures,
  PlaylistDetails,
  PlaylistRef,
  PlaylistWriter,
  TopTrack,
  TrackCatalog,
} from '@festlist/shared';
import type { SpotifyCredentials } from '@festlist/config';
import { SpotifyAuth } from './auth';
import { SpotifySearch } from './search';
import { SpotifyArtists } from './artists';
import { SpotifyTracks } from './tracks';
import { SpotifyPlaylists } from './playlists';
import { SpotifyRateLimiter } from './rate-limit';

export { SpotifyAuth } from './auth';
export type { SpotifyGrantType, SpotifyTokenData } from './auth';

export { SpotifySearch } from './search';
export { SpotifyArtists } from './artists';
export { SpotifyTracks } from './tracks';
export { SpotifyPlaylists } from './playlists';

export { SpotifyRateLimiter } from './rate-limit';
export type { RateLimitState } from './rate-limit';

export { SPOTIFY_API_BASE, spotifyFetch, throwForStatus } from './fetch';

export interface SpotifyServiceConfig extends SpotifyCredentials {
  market?: string;
}

// Convenience class that combines all Spotify functionality
export class SpotifyService implements ArtistCatalog, TrackCatalog, PlaylistWriter {
  public readonly auth: SpotifyAuth;
  public readonly search: SpotifySearch;
  public readonly artists: SpotifyArtists;
  public readonly tracks: SpotifyTracks;
  public readonly playlists: SpotifyPlaylists;
  public readonly rateLimiter: SpotifyRateLimiter;
  /** First 8 chars of client ID for logging/debugging */
  public readonly clientIdPrefix: string;
  private readonly market?: string;

  constructor(config: SpotifyServiceConfig) {
    this.clientIdPrefix = config.clientId.substring(0, 8);
    this.market = config.market;

    // Create shared rate limiter for all Spotify API calls
    this.rateLimiter = new SpotifyRateLimiter();

    this.auth = new SpotifyAuth({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      refreshToken: config.refreshToken,
    });

    this.search = new SpotifySearch(this.auth, this.rateLimiter);
    this.artists = new SpotifyArtists(this.auth, this.rateLimiter);
    this.tracks = new SpotifyTracks(this.auth, this.rateLimiter);
    this.playlists = new SpotifyPlaylists(this.auth, this.rateLimiter);
  }

  async searchArtist(name: string): Promise<ArtistMatch | null> {
    return this.search.searchArtist(name);
  }

  async getArtistTopTracks(artistId: string): Promise<TopTrack[]> {
    return this.artists.getArtistTopTracks(artistId, this.market);
  }

  async getAudioFeatures(trackId: string): Promise<AudioFeatures | null> {
    return this.tracks.getAudioFeatures(trackId);
  }

  async createPlaylist(owner: string, details: PlaylistDetails): Promise<PlaylistRef> {
    return this.playlists.createPlaylist(owner, details);
  }

  async addItems(playlistId: string, uris: string[]): Promise<void> {
    return this.playlists.addItems(playlistId, uris);
  }
}
