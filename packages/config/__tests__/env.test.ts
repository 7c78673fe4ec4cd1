// Environment config tests

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@festlist/shared';
import { loadEnvConfig } from '../src/env';

describe('loadEnvConfig', () => {
  it('builds config from a complete environment', () => {
    const config = loadEnvConfig({
      SPOTIFY_CLIENT_ID: 'test-client',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      SPOTIFY_REFRESH_TOKEN: 'test-refresh',
      SPOTIFY_USER: 'festival-bot',
      PORT: '8080',
      ENVIRONMENT: 'production',
    });

    expect(config).toEqual({
      spotify: { clientId: 'test-client', clientSecret: 'test-secret', refreshToken: 'test-refresh' },
      playlistOwner: 'festival-bot',
      port: 8080,
      environment: 'production',
    });
  });

  it('applies defaults for optional keys', () => {
    const config = loadEnvConfig({ SPOTIFY_CLIENT_ID: 'test-client', SPOTIFY_CLIENT_SECRET: 'test-secret' });

    expect(config.port).toBe(3000);
    expect(config.environment).toBe('development');
    expect(config.playlistOwner).toBeUndefined();
    expect(config.spotify.refreshToken).toBeUndefined();
  });

  it('lists every missing required key', () => {
    expect(() => loadEnvConfig({ SPOTIFY_CLIENT_ID: '  ' })).toThrow(
      'Missing required environment variables: SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET'
    );
    expect(() => loadEnvConfig({})).toThrow(ValidationError);
  });

  it('rejects a non-numeric port', () => {
    expect(() =>
      loadEnvConfig({ SPOTIFY_CLIENT_ID: 'a', SPOTIFY_CLIENT_SECRET: 'b', PORT: 'eighty' })
    ).toThrow('Invalid PORT: eighty');
  });
});
