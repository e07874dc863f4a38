export * from './functionHandle';
export * from './moduleToLoad';
export * from './schema';
