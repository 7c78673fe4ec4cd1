// Builds the explicit application config from an environment record.
// Only the server entry point hands process.env in here.

import { ValidationError } from '@festlist/shared';

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  /** User refresh token; required for playlist writes */
  refreshToken?: string;
}

export interface AppConfig {
  spotify: SpotifyCredentials;
  /** Spotify user id that owns published playlists */
  playlistOwner?: string;
  port: number;
  environment: string;
}

const REQUIRED_KEYS = ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'] as const;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadEnvConfig(env: Record<string, string | undefined>): AppConfig {
  const missing = REQUIRED_KEYS.filter((key) => !optional(env[key]));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required environment variables: ${missing.join(', ')}`, {
      missing,
    });
  }

  const portValue = optional(env.PORT) ?? '3000';
  const port = Number.parseInt(portValue, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ValidationError(`Invalid PORT: ${portValue}`);
  }

  return {
    spotify: {
      clientId: optional(env.SPOTIFY_CLIENT_ID) ?? '',
      clientSecret: optional(env.SPOTIFY_CLIENT_SECRET) ?? '',
      refreshToken: optional(env.SPOTIFY_REFRESH_TOKEN),
    },
    playlistOwner: optional(env.SPOTIFY_USER),
    port,
    environment: optional(env.ENVIRONMENT) ?? 'development',
  };
}
