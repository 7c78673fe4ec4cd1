// ABOUTME: Error classes shared by the Spotify client, curation and the API.
// ABOUTME: Every failure the API reports is an AppError carrying its HTTP status and code.

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number = 500,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/** Bad input: request bodies, options, environment */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/** The provider answered with a status the client cannot recover from */
export class ExternalApiError extends AppError {
  constructor(service: string, message: string, status: number = 502) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', status);
    this.name = 'ExternalApiError';
  }
}

/** Still throttled after the retry budget ran out */
export class RateLimitError extends AppError {
  constructor(
    service: string,
    public retryAfter?: number
  ) {
    super(
      `Rate limit exceeded for ${service}`,
      'RATE_LIMIT_ERROR',
      429,
      retryAfter !== undefined ? { retryAfter } : undefined
    );
    this.name = 'RateLimitError';
  }
}

/**
 * A lineup name the catalog search returned nothing for.
 */
export class ArtistResolutionError extends AppError {
  constructor(public query: string) {
    super(`Could not resolve artist: ${query}`, 'ARTIST_NOT_FOUND', 404, { query });
    this.name = 'ArtistResolutionError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown): AppError {
  if (isAppError(error)) return error;
  const message = error instanceof Error ? error.message : 'An unexpected error occurred';
  return new AppError(message, 'INTERNAL_ERROR', 500);
}

export interface ErrorBody {
  error: {
    message: string;
    code: string;
    details?: ErrorDetails;
  };
}

export function toErrorBody(error: AppError): ErrorBody {
  return {
    error: {
      message: error.message,
      code: error.code,
      ...(error.details && { details: error.details }),
    },
  };
}

/**
 * JSON response for an error, with the error's status
 */
export function errorResponse(error: AppError): Response {
  return new Response(JSON.stringify(toErrorBody(error)), {
    status: error.status,
    headers: { 'Content-Type': 'application/json' },
  });
}
