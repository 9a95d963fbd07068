/**
 * Shared utilities
 */

export * from './logger.js';
