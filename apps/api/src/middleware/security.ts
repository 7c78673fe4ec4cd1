// Security middleware: CORS and baseline response headers

import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';

// Development origins (only allowed when environment !== 'production')
const DEV_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:5173'];

/**
 * CORS middleware configured for this application
 */
export function corsMiddleware(environment: string | undefined, allowedOrigins: string[] = []): MiddlewareHandler {
  const origins = environment === 'production' ? allowedOrigins : [...allowedOrigins, ...DEV_ORIGINS];

  return cors({
    origin: origins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
    maxAge: 86400, // 24 hours
    credentials: false,
  });
}

/**
 * Security headers for JSON responses
 */
export function securityHeadersMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  };
}
