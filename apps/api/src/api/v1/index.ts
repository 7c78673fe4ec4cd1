// v1 API routes

import { Hono } from 'hono';
import type { AppEnv } from '../../types';
import { artistRoutes } from './artists';
import { trackRoutes } from './tracks';
import { playlistRoutes } from './playlists';

const app = new Hono<AppEnv>();

app.route('/artists', artistRoutes);
app.route('/tracks', trackRoutes);
app.route('/playlists', playlistRoutes);

export const v1Routes = app;
