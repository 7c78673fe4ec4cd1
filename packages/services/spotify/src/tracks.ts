// ABOUTME: Spotify track operations - audio features.
// ABOUTME: Tracks without musical features resolve to null rather than an error.

import type { AudioFeatures } from '@festlist/shared';
import type { SpotifyAuth } from './auth';
import type { SpotifyRateLimiter } from './rate-limit';
import { SPOTIFY_API_BASE, spotifyFetch, throwForStatus } from './fetch';

interface SpotifyAudioFeaturesResponse {
  id: string;
  danceability: number;
  energy: number;
  tempo: number;
  speechiness: number;
}

export class SpotifyTracks {
  constructor(
    private auth: SpotifyAuth,
    private rateLimiter: SpotifyRateLimiter
  ) {}

  async getAudioFeatures(trackId: string): Promise<AudioFeatures | null> {
    const accessToken = await this.auth.getAccessToken();

    const response = await spotifyFetch(
      `${SPOTIFY_API_BASE}/audio-features/${encodeURIComponent(trackId)}`,
      {
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: 'fast',
      },
      this.rateLimiter
    );

    // Spotify answers 404 for recordings it has no analysis for
    if (response.status === 404) {
      console.log(`[Spotify] No audio features for track ${trackId}`);
      return null;
    }

    if (!response.ok) {
      return throwForStatus(response, `fetch audio features for track ${trackId}`);
    }

    const data = (await response.json()) as SpotifyAudioFeaturesResponse | null;
    if (!data) {
      return null;
    }

    return {
      danceability: data.danceability,
      energy: data.energy,
      tempo: data.tempo,
      speechiness: data.speechiness,
    };
  }
}
