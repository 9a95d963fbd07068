/**
 * Relay exports
 */

export type { RelayConfig, RelayEvents } from './relay.js';
export { Relay } from './relay.js';

export type { SignalTarget, ShutdownHookOptions } from './process-control.js';
export { STOP_COMMAND, watchStopCommand, registerShutdownHook } from './process-control.js';
