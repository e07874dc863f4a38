export * from './errors';
export * from './config';
export { createAppLogger, getLoggerOptions, logger } from './logger';
export * from './functionHandle';
export * from './job';
