// ABOUTME: Spotify artist operations - provider-ranked top tracks.

import { NotFoundError, type TopTrack } from '@festlist/shared';
import { CURATION_CONFIG } from '@festlist/config';
import type { SpotifyAuth } from './auth';
import type { SpotifyRateLimiter } from './rate-limit';
import { SPOTIFY_API_BASE, spotifyFetch, throwForStatus } from './fetch';

interface SpotifyTopTracksResponse {
  tracks: Array<{
    id: string;
    name: string;
    popularity: number;
  }>;
}

export class SpotifyArtists {
  constructor(
    private auth: SpotifyAuth,
    private rateLimiter: SpotifyRateLimiter
  ) {}

  async getArtistTopTracks(artistId: string, market: string = CURATION_CONFIG.market): Promise<TopTrack[]> {
    const accessToken = await this.auth.getAccessToken();

    const params = new URLSearchParams({ market });
    const response = await spotifyFetch(
      `${SPOTIFY_API_BASE}/artists/${encodeURIComponent(artistId)}/top-tracks?${params}`,
      {
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: 'fast',
      },
      this.rateLimiter
    );

    if (!response.ok) {
      if (response.status === 404) {
        throw new NotFoundError('Artist', artistId);
      }
      return throwForStatus(response, `fetch top tracks for artist ${artistId}`);
    }

    const data = (await response.json()) as SpotifyTopTracksResponse;

    return data.tracks.map((track) => ({
      id: track.id,
      name: track.name,
      popularity: track.popularity,
    }));
  }
}
