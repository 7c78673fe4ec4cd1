// ABOUTME: Request body parsing for the v1 routes.
// ABOUTME: Every helper narrows unknown JSON or throws a ValidationError naming the field.

import type { Context } from 'hono';
import { ValidationError, type ArtistRecord, type TrackRow } from '@festlist/shared';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonBody(c: Context): Promise<JsonObject> {
  let body: unknown;
  try {
    body = await c.req.json<unknown>();
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function requireString(body: JsonObject, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  return value;
}

export function optionalString(body: JsonObject, field: string): string | undefined {
  return body[field] === undefined ? undefined : requireString(body, field);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function optionalStringArray(body: JsonObject, field: string): string[] | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw new ValidationError(`${field} must be an array of strings`, { field });
  }
  return value;
}

export function requireStringArray(body: JsonObject, field: string): string[] {
  const value = optionalStringArray(body, field);
  if (value === undefined || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty array of strings`, { field });
  }
  return value;
}

export function optionalBoolean(body: JsonObject, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, { field });
  }
  return value;
}

export function optionalNonNegativeInt(body: JsonObject, field: string): number | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, { field });
  }
  return value;
}

export function optionalEnum<T extends string>(
  body: JsonObject,
  field: string,
  allowed: readonly T[]
): T | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of: ${allowed.join(', ')}`, { field });
  }
  return match;
}

function numberField(item: JsonObject, field: string, path: string): number {
  const value = item[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${path}.${field} must be a number`, { field: `${path}.${field}` });
  }
  return value;
}

// Absent audio features stay null, never 0
function nullableNumberField(item: JsonObject, field: string, path: string): number | null {
  const value = item[field];
  return value === null || value === undefined ? null : numberField(item, field, path);
}

function stringField(item: JsonObject, field: string, path: string): string {
  const value = item[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`${path}.${field} must be a string`, { field: `${path}.${field}` });
  }
  return value;
}

function nullableStringField(item: JsonObject, field: string, path: string): string | null {
  const value = item[field];
  return value === null || value === undefined ? null : stringField(item, field, path);
}

function genresField(item: JsonObject, field: string, path: string): string[] {
  const value = item[field] ?? [];
  if (!isStringArray(value)) {
    throw new ValidationError(`${path}.${field} must be an array of strings`, { field: `${path}.${field}` });
  }
  return value;
}

function requireObjectArray(body: JsonObject, field: string): JsonObject[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array`, { field });
  }
  return value.map((item, i) => {
    if (!isRecord(item)) {
      throw new ValidationError(`${field}[${i}] must be an object`, { field: `${field}[${i}]` });
    }
    return item;
  });
}

export function parseTrackRows(body: JsonObject, field: string): TrackRow[] {
  return requireObjectArray(body, field).map((item, i) => {
    const path = `${field}[${i}]`;
    return {
      title: stringField(item, 'title', path),
      trackId: stringField(item, 'trackId', path),
      trackPopularity: numberField(item, 'trackPopularity', path),
      danceability: nullableNumberField(item, 'danceability', path),
      energy: nullableNumberField(item, 'energy', path),
      tempo: nullableNumberField(item, 'tempo', path),
      speechiness: nullableNumberField(item, 'speechiness', path),
      artistName: stringField(item, 'artistName', path),
      artistId: stringField(item, 'artistId', path),
      artistGenres: genresField(item, 'artistGenres', path),
      artistPopularity: numberField(item, 'artistPopularity', path),
      artistImageUrl: nullableStringField(item, 'artistImageUrl', path),
    };
  });
}

export function parseArtistRecords(body: JsonObject, field: string): ArtistRecord[] | undefined {
  if (body[field] === undefined) return undefined;
  return requireObjectArray(body, field).map((item, i) => {
    const path = `${field}[${i}]`;
    return {
      id: stringField(item, 'id', path),
      name: stringField(item, 'name', path),
      genres: genresField(item, 'genres', path),
      popularity: numberField(item, 'popularity', path),
      imageUrl: nullableStringField(item, 'imageUrl', path),
    };
  });
}
