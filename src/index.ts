export * from './positioning';
export * from './constants';
export type * from './types';
export { logger, createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
