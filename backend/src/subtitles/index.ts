export * from './types';
export * from './assParser';
export * from './subtitleUtils';
