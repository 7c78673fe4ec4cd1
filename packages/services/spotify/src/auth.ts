// ABOUTME: Spotify OAuth token management with automatic refresh.
// ABOUTME: Keeps the access token in memory and refreshes it shortly before expiry.

import { fetchWithTimeout, ExternalApiError } from '@festlist/shared';
import type { SpotifyCredentials } from '@festlist/config';

const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

// Refresh a minute early so in-flight requests never carry an expired token
const EXPIRY_BUFFER_MS = 60_000;

export interface SpotifyTokenData {
  access_token: string;
  expires_at: number;
}

export type SpotifyGrantType = 'client_credentials' | 'refresh_token';

export class SpotifyAuth {
  private token: SpotifyTokenData | null = null;
  private pending: Promise<string> | null = null;

  constructor(private config: SpotifyCredentials) {}

  /**
   * Catalog reads work with an app token; playlist writes need the user
   * refresh-token grant.
   */
  get grantType(): SpotifyGrantType {
    return this.config.refreshToken ? 'refresh_token' : 'client_credentials';
  }

  async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expires_at) {
      return this.token.access_token;
    }

    // Concurrent callers share one refresh
    if (!this.pending) {
      this.pending = this.refreshAccessToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async refreshAccessToken(): Promise<string> {
    const clientIdPrefix = this.config.clientId.substring(0, 8);
    console.log(`[Spotify] Requesting ${this.grantType} token for app ${clientIdPrefix}...`);

    const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');

    const body = new URLSearchParams({ grant_type: this.grantType });
    if (this.config.refreshToken) {
      body.set('refresh_token', this.config.refreshToken);
    }

    const response = await fetchWithTimeout(SPOTIFY_TOKEN_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${credentials}`,
      },
      body: body.toString(),
      timeout: 'fast',
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ExternalApiError('Spotify', `token request failed: ${response.status} ${error}`);
    }

    const data = (await response.json()) as {
      access_token: string;
      expires_in: number;
    };

    this.token = {
      access_token: data.access_token,
      expires_at: Date.now() + data.expires_in * 1000 - EXPIRY_BUFFER_MS,
    };

    return data.access_token;
  }
}
