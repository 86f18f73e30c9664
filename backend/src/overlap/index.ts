export * from './types';
export * from './errors';
export * from './overlapDetector';
export * from './resolutionCoordinator';
export * from './terminalChannel';
