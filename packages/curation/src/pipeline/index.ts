// Curation pipeline: duplicates -> versions -> popularity-weighted retention

import type { TrackTable } from '@festlist/shared';
import { removeDuplicates } from './duplicates';
import { collapseVersions } from './versions';
import { trimByArtistPopularity, type RetentionOptions } from './retention';
import type { CurationResult } from './types';

export { removeDuplicates } from './duplicates';
export { collapseVersions, parseTrackTitle } from './versions';
export type { ParsedTitle } from './versions';
export { trimByArtistPopularity, retainedCount, retentionPercentage } from './retention';
export type { RetentionInputs, RetentionOptions } from './retention';
export type { CurationReport, CurationResult, StageResult } from './types';

export function curateTracks(table: TrackTable, options: RetentionOptions = {}): CurationResult {
  const deduped = removeDuplicates(table);
  const collapsed = collapseVersions(deduped.tracks);
  const trimmed = trimByArtistPopularity(collapsed.tracks, options);

  console.log(
    `[Curation] ${table.length} tracks -> ${trimmed.tracks.length} ` +
      `(${deduped.removed.length} duplicates, ${collapsed.removed.length} versions, ${trimmed.removed.length} trimmed)`
  );

  return {
    tracks: trimmed.tracks,
    report: {
      duplicates: deduped.removed,
      versions: collapsed.removed,
      trimmed: trimmed.removed,
    },
  };
}
