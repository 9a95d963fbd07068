/**
 * Packet classification exports
 */

export type { Classification } from './classifier.js';
export { SUPPRESSED_PACKETS, kindName, classify } from './classifier.js';
