// Curation defaults and genre formatting tables

export const CURATION_CONFIG = {
  tracksPerArtist: 10,
  // Stage C never keeps less than this share of the largest artist's track count
  retentionFloorPct: 30,
  minRetainedTracks: 2,
  // Spotify accepts at most 100 items per add-items call
  playlistBatchSize: 100,
  resolveConcurrency: 1,
  collectConcurrency: 1,
  market: 'US',
  defaultDescription: 'Created with Festlist.',
} as const;

/**
 * Title-cased genre tokens and their preferred spelling.
 * Extend this as new acronyms show up in catalog genre tags.
 */
export const GENRE_ACRONYMS: Readonly<Record<string, string>> = {
  Edm: 'EDM',
  Dnb: 'DnB',
  Uk: 'UK',
  Pov: 'POV',
  Mbp: 'MBP',
  Atl: 'ATL',
  Nyc: 'NYC',
};
