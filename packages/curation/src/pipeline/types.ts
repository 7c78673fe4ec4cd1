import type { TrackRow } from '@festlist/shared';

/**
 * Output of one curation stage: the new table plus the titles it dropped,
 * in the order they appeared in the stage's input.
 */
export interface StageResult {
  tracks: TrackRow[];
  removed: string[];
}

export interface CurationReport {
  duplicates: string[];
  versions: string[];
  trimmed: string[];
}

export interface CurationResult {
  tracks: TrackRow[];
  report: CurationReport;
}
