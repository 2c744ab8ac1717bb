export * from './schema';
export * from './flags';
export * from './types/config';
