/**
 * Session exports
 */

export type { SessionConfig, SessionEvents, SessionState } from './session.js';
export { Session, CONNECTION_LOST, allocateSessionId } from './session.js';
