// Outbound rate limits and retry policy for catalog calls

export const RATE_LIMITS = {
  spotify: {
    requestsPerMinute: 150, // (Spotify allows ~180)
    maxRetries: 5,
    // Used when a 429 arrives without a Retry-After header
    defaultRetryAfterSeconds: 10,
    maxRetryWaitMs: 30_000,
  },
} as const;

export interface RetryPolicy {
  maxRetries: number;
  defaultRetryAfterSeconds: number;
  maxRetryWaitMs: number;
}
