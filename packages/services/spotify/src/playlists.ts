// ABOUTME: Spotify playlist writes - create a playlist and append items.
// ABOUTME: Requires a user token (refresh-token grant).

import { ValidationError, type PlaylistDetails, type PlaylistRef } from '@festlist/shared';
import { CURATION_CONFIG } from '@festlist/config';
import type { SpotifyAuth } from './auth';
import type { SpotifyRateLimiter } from './rate-limit';
import { SPOTIFY_API_BASE, spotifyFetch, throwForStatus } from './fetch';

interface SpotifyPlaylistResponse {
  id: string;
  uri: string;
  external_urls: { spotify: string };
}

export class SpotifyPlaylists {
  constructor(
    private auth: SpotifyAuth,
    private rateLimiter: SpotifyRateLimiter
  ) {}

  async createPlaylist(owner: string, details: PlaylistDetails): Promise<PlaylistRef> {
    if (this.auth.grantType !== 'refresh_token') {
      throw new ValidationError('Publishing playlists requires SPOTIFY_REFRESH_TOKEN');
    }

    const accessToken = await this.auth.getAccessToken();

    const response = await spotifyFetch(
      `${SPOTIFY_API_BASE}/users/${encodeURIComponent(owner)}/playlists`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          name: details.name,
          public: details.visibility === 'public',
          description: details.description,
        }),
        timeout: 'slow',
      },
      this.rateLimiter
    );

    if (!response.ok) {
      return throwForStatus(response, `create playlist "${details.name}"`);
    }

    const data = (await response.json()) as SpotifyPlaylistResponse;
    console.log(`[Spotify] Created playlist ${data.id} for ${owner}`);

    return {
      id: data.id,
      uri: data.uri,
      url: data.external_urls.spotify,
    };
  }

  async addItems(playlistId: string, uris: string[]): Promise<void> {
    if (uris.length > CURATION_CONFIG.playlistBatchSize) {
      throw new ValidationError(
        `Spotify accepts at most ${CURATION_CONFIG.playlistBatchSize} items per request, got ${uris.length}`
      );
    }

    const accessToken = await this.auth.getAccessToken();

    const response = await spotifyFetch(
      `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/tracks`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ uris }),
        timeout: 'slow',
      },
      this.rateLimiter
    );

    if (!response.ok) {
      return throwForStatus(response, `add ${uris.length} items to playlist ${playlistId}`);
    }
  }
}
