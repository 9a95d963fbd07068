/**
 * Configuration exports
 */

export type { RelayConfigInput, ResolvedRelayConfig } from './config.js';
export { RelayConfigSchema, resolveConfig, DEFAULT_LISTEN, DEFAULT_UPSTREAM } from './config.js';
