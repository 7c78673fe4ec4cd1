// ABOUTME: Artist Resolver - turns lineup names into catalog artist records.
// ABOUTME: Warns on fuzzy matches, fails loudly when the catalog has nothing.

import { CURATION_CONFIG } from '@festlist/config';
import {
  ArtistResolutionError,
  mapWithConcurrency,
  type ArtistCatalog,
  type ArtistRecord,
  type ResolutionMismatch,
} from '@festlist/shared';
import { normalizeGenres } from './genre';

export interface ResolveOptions {
  /** Called for every name that resolved to a differently spelled artist */
  onMismatch?: (mismatch: ResolutionMismatch) => void;
  /** Parallel searches in flight; results keep input order either way */
  concurrency?: number;
  acronyms?: Readonly<Record<string, string>>;
}

export async function resolveArtist(
  catalog: ArtistCatalog,
  name: string,
  options: ResolveOptions = {}
): Promise<ArtistRecord> {
  const match = await catalog.searchArtist(name);
  if (!match) {
    console.error(`[Resolver] No catalog result for "${name}"`);
    throw new ArtistResolutionError(name);
  }

  if (match.name.toUpperCase() !== name.toUpperCase()) {
    console.warn(`[Resolver] Warning: Searching for ${name} yielded result ${match.name}.`);
    options.onMismatch?.({ query: name, resolvedName: match.name, artistId: match.id });
  }

  return {
    id: match.id,
    name: match.name,
    genres: normalizeGenres(match.genres, options.acronyms),
    popularity: match.popularity,
    // Images arrive largest first; the smallest is enough for thumbnails
    imageUrl: match.images.length > 0 ? match.images[match.images.length - 1] : null,
  };
}

/**
 * Resolve every name to one record, in input order. The first name the
 * catalog cannot find rejects the whole call with an ArtistResolutionError.
 */
export async function resolveArtists(
  catalog: ArtistCatalog,
  names: readonly string[],
  options: ResolveOptions = {}
): Promise<ArtistRecord[]> {
  const concurrency = options.concurrency ?? CURATION_CONFIG.resolveConcurrency;
  return mapWithConcurrency(names, concurrency, (name) => resolveArtist(catalog, name, options));
}
