// Stage C - popularity-weighted retention

import { CURATION_CONFIG } from '@festlist/config';
import { groupBy, type TrackRow, type TrackTable } from '@festlist/shared';
import type { StageResult } from './types';

export interface RetentionOptions {
  /** Lowest retention percentage any artist can fall to */
  floorPct?: number;
  /** Fewest rows any artist keeps */
  minTracks?: number;
}

export interface RetentionInputs {
  /** Rows of the artist with the most rows */
  maxCount: number;
  /** Highest artist popularity in the table */
  maxPopularity: number;
}

export function retentionPercentage(artistPopularity: number, maxPopularity: number, floorPct: number = CURATION_CONFIG.retentionFloorPct): number {
  const pct = 100 - (maxPopularity - artistPopularity);
  return Math.min(Math.max(pct, floorPct), 100);
}

/**
 * Rows an artist keeps: its retention percentage of the largest artist's row
 * count, floored, and never below the minimum.
 */
export function retainedCount(
  artistPopularity: number,
  { maxCount, maxPopularity }: RetentionInputs,
  options: RetentionOptions = {}
): number {
  const pct = retentionPercentage(artistPopularity, maxPopularity, options.floorPct);
  const minTracks = options.minTracks ?? CURATION_CONFIG.minRetainedTracks;
  // Integer arithmetic keeps floor() exact (0.3 * 10 must give 3)
  return Math.max(minTracks, Math.floor((pct * maxCount) / 100));
}

/**
 * Keep more tracks from the bigger names on the lineup. Each artist keeps the
 * first N of its rows in the order the table arrives in; the table itself is
 * not re-sorted.
 */
export function trimByArtistPopularity(table: TrackTable, options: RetentionOptions = {}): StageResult {
  if (table.length === 0) {
    return { tracks: [], removed: [] };
  }

  const indexed = table.map((row, index) => ({ row, index }));
  const groups = groupBy(indexed, ({ row }) => row.artistId);
  // Loops rather than Math.max(...spread): tables can outgrow the argument limit
  let maxCount = 0;
  for (const members of groups.values()) {
    if (members.length > maxCount) maxCount = members.length;
  }
  let maxPopularity = -Infinity;
  for (const row of table) {
    if (row.artistPopularity > maxPopularity) maxPopularity = row.artistPopularity;
  }

  const keptIndexes = new Set<number>();
  for (const members of groups.values()) {
    const limit = retainedCount(members[0].row.artistPopularity, { maxCount, maxPopularity }, options);
    for (const { index } of members.slice(0, limit)) {
      keptIndexes.add(index);
    }
  }

  const tracks: TrackRow[] = indexed.filter(({ index }) => keptIndexes.has(index)).map(({ row }) => row);
  const removed = indexed.filter(({ index }) => !keptIndexes.has(index)).map(({ row }) => row.title);

  return { tracks, removed };
}
