export * from './job';
export * from './factory';
export * from './schema';
