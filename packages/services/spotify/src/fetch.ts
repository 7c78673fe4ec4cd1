// ABOUTME: Spotify-specific fetch with rate limiting and retry logic.
// ABOUTME: Wraps fetchWithTimeout with capped 429/502/503 retries.

import {
  ExternalApiError,
  RateLimitError,
  fetchWithTimeout,
  sleep,
  type FetchWithTimeoutOptions,
} from '@festlist/shared';
import { RATE_LIMITS, type RetryPolicy } from '@festlist/config';
import type { SpotifyRateLimiter } from './rate-limit';

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';

function parseRetryAfter(response: Response, fallbackSeconds: number): number {
  const header = response.headers.get('Retry-After');
  const seconds = header === null ? NaN : Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : fallbackSeconds;
}

/**
 * Make a rate-limited request to the Spotify API with automatic retry on 429, 502, 503.
 *
 * Retries are capped by `policy.maxRetries`; once exhausted the last response
 * is returned so the caller can turn it into a terminal error.
 */
export async function spotifyFetch(
  url: string,
  options: FetchWithTimeoutOptions,
  rateLimiter: SpotifyRateLimiter,
  policy: RetryPolicy = RATE_LIMITS.spotify
): Promise<Response> {
  const { maxRetries } = policy;

  for (let attempt = 0; ; attempt++) {
    await rateLimiter.acquire();

    const response = await fetchWithTimeout(url, options);

    if (response.ok || (response.status !== 429 && response.status !== 502 && response.status !== 503)) {
      return response;
    }

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response, policy.defaultRetryAfterSeconds);
      rateLimiter.recordRateLimitResponse(retryAfter, policy.maxRetryWaitMs);

      if (attempt >= maxRetries) {
        console.error(`[Spotify] Max retries (${maxRetries}) exceeded for ${url} - 429 Rate Limited`);
        return response;
      }

      // Release the connection before waiting; the body is not needed
      await response.body?.cancel();
      const waitMs = Math.min(retryAfter * 1000, policy.maxRetryWaitMs);
      console.log(`[Spotify] 429 retry ${attempt + 1}/${maxRetries} after ${waitMs}ms for ${url}`);
      await sleep(waitMs);
      continue;
    }

    // 502/503 - transient gateway errors
    if (attempt >= maxRetries) {
      console.error(`[Spotify] Max retries (${maxRetries}) exceeded for ${url} - ${response.status} ${response.statusText}`);
      return response;
    }

    await response.body?.cancel();
    const baseDelay = Math.min(1000 * Math.pow(2, attempt), 10000); // 1s, 2s, 4s, 8s, max 10s
    const waitMs = Math.min(baseDelay + Math.random() * 1000, policy.maxRetryWaitMs);
    console.log(`[Spotify] ${response.status} retry ${attempt + 1}/${maxRetries} after ${Math.round(waitMs)}ms for ${url}`);
    await sleep(waitMs);
  }
}

/**
 * Turn a non-OK Spotify response into the matching AppError.
 */
export async function throwForStatus(response: Response, action: string): Promise<never> {
  if (response.status === 429) {
    const retryAfter = response.headers.get('Retry-After');
    console.error(`[Spotify] 429 Rate Limited while trying to ${action}, Retry-After: ${retryAfter ?? 'unknown'}s`);
    throw new RateLimitError('Spotify', retryAfter ? Number.parseInt(retryAfter, 10) : undefined);
  }
  const body = await response.text();
  console.error(`[Spotify] Failed to ${action}: ${response.status} ${response.statusText} ${body}`);
  throw new ExternalApiError('Spotify', `failed to ${action}: ${response.status} ${response.statusText}`);
}
