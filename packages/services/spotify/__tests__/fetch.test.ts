// spotifyFetch retry tests

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { spotifyFetch } from '../src/fetch';
import { SpotifyRateLimiter } from '../src/rate-limit';
import { mockFetchResponse, silenceConsole } from './utils/mocks';

const policy = { maxRetries: 2, defaultRetryAfterSeconds: 0, maxRetryWaitMs: 10 };

function queueResponses(...responses: Response[]) {
  const mockFetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error('Unexpected fetch');
    }
    return next;
  });
  globalThis.fetch = mockFetch;
  return mockFetch;
}

describe('spotifyFetch', () => {
  let rateLimiter: SpotifyRateLimiter;

  beforeEach(() => {
    silenceConsole();
    rateLimiter = new SpotifyRateLimiter();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries a 429 after the Retry-After delay and returns the next success', async () => {
    const mockFetch = queueResponses(
      mockFetchResponse({ error: 'slow down' }, { status: 429, headers: { 'Retry-After': '0' } }),
      mockFetchResponse({ ok: true })
    );

    const response = await spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, policy);

    expect(response.status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('gives up after the retry cap and returns the last 429', async () => {
    const rateLimited = () => mockFetchResponse({}, { status: 429, headers: { 'Retry-After': '0' } });
    const mockFetch = queueResponses(rateLimited(), rateLimited(), rateLimited());

    const response = await spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, policy);

    expect(response.status).toBe(429);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('falls back to the default delay when Retry-After is missing', async () => {
    const mockFetch = queueResponses(mockFetchResponse({}, { status: 429 }), mockFetchResponse({ ok: true }));

    const response = await spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, policy);

    expect(response.status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('caps a long Retry-After at the policy wait', async () => {
    vi.useFakeTimers();
    try {
      const mockFetch = queueResponses(
        mockFetchResponse({}, { status: 429, headers: { 'Retry-After': '3600' } }),
        mockFetchResponse({ ok: true })
      );

      const pending = spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, {
        maxRetries: 2,
        defaultRetryAfterSeconds: 10,
        maxRetryWaitMs: 30_000,
      });
      await vi.advanceTimersByTimeAsync(30_000);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect((await pending).status).toBe(200);
    } finally {
      vi.useRealTimers();
    }
  });

  it('backs off exponentially on 502 and 503 and drains the discarded bodies', async () => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0);
    try {
      const badGateway = mockFetchResponse({}, { status: 502 });
      const unavailable = mockFetchResponse({}, { status: 503 });
      const mockFetch = queueResponses(badGateway, unavailable, mockFetchResponse({ ok: true }));

      const pending = spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, {
        maxRetries: 2,
        defaultRetryAfterSeconds: 10,
        maxRetryWaitMs: 30_000,
      });

      await vi.advanceTimersByTimeAsync(1_000);
      expect(mockFetch).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(mockFetch).toHaveBeenCalledTimes(3);

      expect((await pending).status).toBe(200);
      expect(badGateway.bodyUsed).toBe(true);
      expect(unavailable.bodyUsed).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('returns non-retryable errors immediately', async () => {
    const mockFetch = queueResponses(mockFetchResponse({ error: 'missing' }, { status: 404 }));

    const response = await spotifyFetch('https://api.spotify.com/v1/test', {}, rateLimiter, policy);

    expect(response.status).toBe(404);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});

describe('SpotifyRateLimiter', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('counts requests in the current window', async () => {
    const limiter = new SpotifyRateLimiter(10);

    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.getStats()).toMatchObject({ requestCount: 2, maxRequests: 10, inCooldown: false });
  });

  it('never holds a cooldown longer than its cap', async () => {
    vi.useFakeTimers();
    try {
      const limiter = new SpotifyRateLimiter(10, 5_000);
      limiter.recordRateLimitResponse(3600);

      let acquired = false;
      const pending = limiter.acquire().then(() => {
        acquired = true;
      });
      await vi.advanceTimersByTimeAsync(5_000);
      await pending;

      expect(acquired).toBe(true);
      expect(limiter.getStats()).toMatchObject({ requestCount: 1, inCooldown: false });
    } finally {
      vi.useRealTimers();
    }
  });

  it('enters cooldown after a 429', () => {
    const limiter = new SpotifyRateLimiter(10);

    limiter.recordRateLimitResponse(30);

    expect(limiter.getStats()).toMatchObject({ requestCount: 0, inCooldown: true });
  });
});
