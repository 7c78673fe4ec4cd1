// ABOUTME: Hono application factory - installs middleware, routes and the error handler.
// ABOUTME: Services are injected so tests can run the app against in-memory fakes.

import { Hono } from 'hono';
import { errorResponse, toAppError } from '@festlist/shared';
import { apiRoutes } from './api';
import { corsMiddleware, securityHeadersMiddleware } from './middleware/security';
import type { AppEnv, AppServices } from './types';

export type { AppEnv, AppServices, Variables } from './types';

export function createApp(services: AppServices) {
  const app = new Hono<AppEnv>();

  app.use('*', securityHeadersMiddleware());
  app.use('/api/*', corsMiddleware(services.environment));

  // Make services available to every handler
  app.use('*', async (c, next) => {
    c.set('catalog', services.catalog);
    c.set('writer', services.writer ?? null);
    c.set('playlistOwner', services.playlistOwner ?? null);
    await next();
  });

  app.get('/health', (c) => c.json({ ok: true }));

  app.route('/api', apiRoutes);

  app.notFound((c) => c.json({ error: { message: 'Not found', code: 'NOT_FOUND' } }, 404));

  app.onError((err, c) => {
    const appError = toAppError(err);
    if (appError.status >= 500) {
      console.error(`[API] ${c.req.method} ${c.req.path} failed:`, err);
    } else {
      console.log(`[API] ${c.req.method} ${c.req.path} -> ${appError.status} ${appError.code}`);
    }
    return errorResponse(appError);
  });

  return app;
}
