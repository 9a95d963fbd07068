/**
 * Credential handling exports
 */

export type { Token } from './token.js';
export {
  tokenFileSchema,
  serializeToken,
  isTokenValid,
  tokenFingerprint,
  expiryIn,
} from './token.js';

export type { CredentialStoreOptions } from './credential-store.js';
export { CredentialStore, DEFAULT_TOKEN_FILE } from './credential-store.js';

export type { AuthProvider } from './token-source.js';
export { TokenSource, acquireToken } from './token-source.js';

export type { DeviceCodePrompt, DeviceCodeAuthOptions } from './device-code.js';
export {
  DeviceCodeAuthProvider,
  LIVE_DEVICE_CODE_URL,
  LIVE_TOKEN_URL,
  DEFAULT_CLIENT_ID,
  DEFAULT_SCOPE,
} from './device-code.js';
