/**
 * Observer exports
 */

export type { PacketDirection, PacketObserver } from './observer.js';
export { createLoggingObserver, packetDetails, dumpValue } from './observer.js';
