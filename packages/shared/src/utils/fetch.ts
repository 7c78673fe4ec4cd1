// ABOUTME: Fetch with a per-request timeout for catalog calls.
// ABOUTME: A stalled request surfaces as a TimeoutError (504) instead of hanging a build.

import { AppError } from './errors';

/**
 * Timeout presets in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Catalog lookups: token, search, top tracks, audio features */
  fast: 10_000,
  /** Playlist writes */
  slow: 30_000,
} as const;

export type TimeoutPreset = keyof typeof DEFAULT_TIMEOUTS;

export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout?: number | TimeoutPreset;
}

export class TimeoutError extends AppError {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

export function timeoutMsFor(timeout: number | TimeoutPreset = 'fast'): number {
  return typeof timeout === 'number' ? timeout : DEFAULT_TIMEOUTS[timeout];
}

export async function fetchWithTimeout(url: string | URL, options: FetchWithTimeoutOptions = {}): Promise<Response> {
  const { timeout, ...init } = options;
  const timeoutMs = timeoutMsFor(timeout);

  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    // AbortSignal.timeout rejects with a DOMException named TimeoutError
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new TimeoutError(url.toString(), timeoutMs);
    }
    throw error;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
