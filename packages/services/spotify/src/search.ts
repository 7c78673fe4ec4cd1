// ABOUTME: Spotify artist search used to resolve lineup names.
// ABOUTME: Returns the single best match with genres, popularity and images.

import type { ArtistMatch } from '@festlist/shared';
import type { SpotifyAuth } from './auth';
import type { SpotifyRateLimiter } from './rate-limit';
import { SPOTIFY_API_BASE, spotifyFetch, throwForStatus } from './fetch';

interface SpotifySearchResponse {
  artists?: {
    items: SpotifyArtist[];
  };
}

interface SpotifyArtist {
  id: string;
  name: string;
  genres?: string[];
  popularity?: number;
  images?: SpotifyImage[];
}

interface SpotifyImage {
  url: string;
  height: number | null;
  width: number | null;
}

export class SpotifySearch {
  constructor(
    private auth: SpotifyAuth,
    private rateLimiter: SpotifyRateLimiter
  ) {}

  async searchArtists(query: string, limit: number = 1): Promise<ArtistMatch[]> {
    console.log(`[Spotify] Searching API: artist "${query}"`);
    const accessToken = await this.auth.getAccessToken();

    const params = new URLSearchParams({ q: query, type: 'artist', limit: limit.toString() });
    const response = await spotifyFetch(
      `${SPOTIFY_API_BASE}/search?${params}`,
      {
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: 'fast',
      },
      this.rateLimiter
    );

    if (!response.ok) {
      return throwForStatus(response, `search for artist "${query}"`);
    }

    const data = (await response.json()) as SpotifySearchResponse;

    return (data.artists?.items ?? []).map((item) => ({
      id: item.id,
      name: item.name,
      genres: item.genres ?? [],
      popularity: item.popularity ?? 0,
      // Spotify lists images largest first
      images: (item.images ?? []).map((image) => image.url),
    }));
  }

  async searchArtist(query: string): Promise<ArtistMatch | null> {
    const results = await this.searchArtists(query, 1);
    return results[0] ?? null;
  }
}
