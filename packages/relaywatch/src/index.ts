/**
 * relaywatch - transparent relay for packetized game connections
 *
 * Accepts game clients, dials the real server on their behalf and forwards
 * packets both ways, reporting each one to an observer.
 */

// Core types
export * from './types/index.js';

// Wire protocol
export * from './wire/index.js';

// Logging and helpers
export * from './utils/index.js';

// Configuration
export * from './config/index.js';

// Credentials
export * from './auth/index.js';

// Transport
export * from './net/index.js';

// Packet classification and observation
export * from './classifier/index.js';
export * from './observer/index.js';

// Sessions and the accept loop
export * from './session/index.js';
export * from './relay/index.js';
