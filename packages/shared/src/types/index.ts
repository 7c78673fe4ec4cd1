// Centralized type exports for the application

export * from './artist';
export * from './catalog';
export * from './track';
