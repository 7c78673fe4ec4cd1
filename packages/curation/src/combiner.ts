// Artist Set Combiner - merges lineup selections with newly entered artists

import type { ArtistRecord } from '@festlist/shared';

/**
 * Selected lineup artists first, then new artists; the first record for a
 * given name wins.
 */
export function combineArtists(
  selectedNames: ReadonlySet<string> | readonly string[],
  lineupArtists: readonly ArtistRecord[],
  newArtists: readonly ArtistRecord[]
): ArtistRecord[] {
  const selected = new Set(selectedNames);
  const seenNames = new Set<string>();
  const combined: ArtistRecord[] = [];

  for (const artist of [...lineupArtists.filter((a) => selected.has(a.name)), ...newArtists]) {
    if (seenNames.has(artist.name)) continue;
    seenNames.add(artist.name);
    combined.push(artist);
  }

  return combined;
}
