// Main entry point for @festlist/shared

export * from './types';
export * from './utils/collections';
export * from './utils/errors';
export * from './utils/fetch';
