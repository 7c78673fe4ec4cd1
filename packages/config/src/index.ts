// Main entry point for @festlist/config package

export * from './curation';
export * from './env';
export * from './rate-limits';

export const SITE_CONFIG = {
  name: 'Festlist',
  description: 'Curated playlists built from festival lineups.',
} as const;
