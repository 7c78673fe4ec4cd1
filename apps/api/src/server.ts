// Node entry point: loads .env, wires the Spotify client and serves the app

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadEnvConfig } from '@festlist/config';
import { SpotifyService } from '@festlist/spotify';
import { createApp } from './index';

const config = loadEnvConfig(process.env);

const spotify = new SpotifyService(config.spotify);
console.log(`[API] Spotify client ${spotify.clientIdPrefix}... using ${spotify.auth.grantType} grant`);

const app = createApp({
  catalog: spotify,
  writer: spotify,
  playlistOwner: config.playlistOwner,
  environment: config.environment,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[API] Listening on http://localhost:${info.port} (${config.environment})`);
});
