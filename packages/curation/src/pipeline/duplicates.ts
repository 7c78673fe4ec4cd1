// Stage A - exact duplicate removal

import type { TrackTable } from '@festlist/shared';
import type { StageResult } from './types';

/**
 * Keep the first row for every track id. The same recording collected twice
 * (e.g. a collaboration in two artists' top tracks) collapses to one row.
 */
export function removeDuplicates(table: TrackTable): StageResult {
  const seen = new Set<string>();
  const tracks: StageResult['tracks'] = [];
  const removed: string[] = [];

  for (const row of table) {
    if (seen.has(row.trackId)) {
      removed.push(row.title);
      continue;
    }
    seen.add(row.trackId);
    tracks.push(row);
  }

  return { tracks, removed };
}
