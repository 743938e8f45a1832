/**
 * @description Public exports for shared utilities.
 * @scope interface
 * @module SharedIndex
 */

export { logger, createModuleLogger, sanitizeLogData } from './logger.js';
