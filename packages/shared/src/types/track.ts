// Types for track data and the curation table

export interface TopTrack {
  id: string;
  name: string;
  popularity: number;
}

export interface AudioFeatures {
  danceability: number;
  energy: number;
  tempo: number;
  speechiness: number;
}

/**
 * One row of the curation table: a track plus a denormalized copy of the
 * artist it was collected for. Feature fields are null when the catalog has
 * no audio features for the track; they are never zero-filled.
 */
export interface TrackRow {
  title: string;
  trackId: string;
  trackPopularity: number;
  danceability: number | null;
  energy: number | null;
  tempo: number | null; // BPM
  speechiness: number | null;
  artistName: string;
  artistId: string;
  artistGenres: string[];
  artistPopularity: number;
  artistImageUrl: string | null;
}

export type TrackTable = readonly TrackRow[];
