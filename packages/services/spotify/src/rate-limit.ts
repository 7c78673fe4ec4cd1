// ABOUTME: In-process rate limiting for Spotify API calls.
// ABOUTME: Tracks a one-minute request window and the cooldown announced by a 429.

import { RATE_LIMITS } from '@festlist/config';
import { sleep } from '@festlist/shared';

export interface RateLimitState {
  requestCount: number;
  windowStart: number;
  retryAfter?: number;
}

export class SpotifyRateLimiter {
  private readonly windowMs = 60000; // 1 minute window
  private state: RateLimitState = { requestCount: 0, windowStart: Date.now() };

  constructor(
    private readonly maxRequests: number = RATE_LIMITS.spotify.requestsPerMinute,
    private readonly maxCooldownMs: number = RATE_LIMITS.spotify.maxRetryWaitMs
  ) {}

  /**
   * Acquire a rate limit token before making a Spotify API request.
   * Waits while the window is full or a 429 cooldown is active.
   */
  async acquire(): Promise<void> {
    for (;;) {
      const now = Date.now();

      if (this.state.retryAfter && now < this.state.retryAfter) {
        const waitMs = this.state.retryAfter - now;
        console.log(`[Spotify] Rate limit cooldown, waiting ${Math.round(waitMs)}ms`);
        await sleep(waitMs);
        continue;
      }

      if (now - this.state.windowStart >= this.windowMs) {
        this.state = { requestCount: 1, windowStart: now };
        return;
      }

      if (this.state.requestCount >= this.maxRequests) {
        const waitMs = this.windowMs - (now - this.state.windowStart);
        console.log(`[Spotify] Local rate limit reached (${this.state.requestCount}/${this.maxRequests}), waiting ${Math.round(waitMs)}ms`);
        await sleep(waitMs);
        continue;
      }

      if (this.state.requestCount >= this.maxRequests * 0.8) {
        console.log(`[Spotify] Rate limit warning: ${this.state.requestCount}/${this.maxRequests} requests in window`);
      }

      this.state = { ...this.state, requestCount: this.state.requestCount + 1 };
      return;
    }
  }

  /**
   * Record a 429 response from Spotify and enter cooldown.
   * The cooldown never exceeds `maxWaitMs`, whatever Retry-After announced.
   * @param retryAfterSeconds - The Retry-After header value in seconds
   */
  recordRateLimitResponse(retryAfterSeconds: number, maxWaitMs: number = this.maxCooldownMs): void {
    const cooldownMs = Math.min(retryAfterSeconds * 1000, maxWaitMs, this.maxCooldownMs);
    console.log(`[Spotify] 429 received (Retry-After ${retryAfterSeconds}s), entering cooldown for ${cooldownMs}ms`);
    const now = Date.now();
    this.state = {
      requestCount: 0,
      windowStart: now,
      retryAfter: now + cooldownMs,
    };
  }

  getStats(): {
    requestCount: number;
    maxRequests: number;
    windowRemainingMs: number;
    inCooldown: boolean;
  } {
    const now = Date.now();
    return {
      requestCount: this.state.requestCount,
      maxRequests: this.maxRequests,
      windowRemainingMs: Math.max(0, this.windowMs - (now - this.state.windowStart)),
      inCooldown: !!(this.state.retryAfter && now < this.state.retryAfter),
    };
  }
}
