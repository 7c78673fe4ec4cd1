// Types for artist data across the application

/**
 * An artist as resolved against the catalog. `id` is the stable key;
 * `name` is whatever display name the catalog returned for the query.
 */
export interface ArtistRecord {
  id: string; // Spotify ID
  name: string;
  genres: string[];
  popularity: number; // 0-100
  imageUrl: string | null;
}

/**
 * Raw best-match search result, before genre normalization and image selection.
 */
export interface ArtistMatch {
  id: string;
  name: string;
  genres: string[];
  popularity: number;
  /** Image URLs in provider order (largest first) */
  images: string[];
}

/**
 * The catalog answered a query with a differently named artist
 * (e.g. "Tiesto" resolving to "Tiësto"). The record is still used.
 */
export interface ResolutionMismatch {
  query: string;
  resolvedName: string;
  artistId: string;
}
