/**
 * @extensor/core - Logging Module
 */

export { createLogger, getDefaultLogger } from './logger';

export type { Logger, LoggerOptions } from './logger';
