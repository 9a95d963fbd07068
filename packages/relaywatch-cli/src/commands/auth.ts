/**
 * Login and logout commands
 */

import { Command } from 'commander';
import {
  CredentialStore,
  DeviceCodeAuthProvider,
  DeviceCodePrompt,
  ResolvedRelayConfig,
  resolveConfig,
  tokenFingerprint,
} from 'relaywatch';
import { CommonOptions, toConfigInput, tokenFileOption } from './options.js';

/**
 * Device code provider for the configured endpoints
 */
export function createAuthProvider(
  config: ResolvedRelayConfig,
  onPrompt: (prompt: DeviceCodePrompt) => void
): DeviceCodeAuthProvider {
  return new DeviceCodeAuthProvider({
    clientId: config.auth.clientId,
    scope: config.auth.scope,
    deviceCodeUrl: config.auth.deviceCodeUrl,
    tokenUrl: config.auth.tokenUrl,
    onPrompt,
  });
}

export function formatPrompt(prompt: DeviceCodePrompt): string {
  return `Sign in at ${prompt.verificationUri} with the code ${prompt.userCode}`;
}

export const loginCommand = new Command('login')
  .description('Sign in and cache a fresh token')
  .addOption(tokenFileOption())
  .action(async (options: CommonOptions) => {
    try {
      const config = resolveConfig(toConfigInput(options));
      const provider = createAuthProvider(config, (prompt) => {
        console.log(formatPrompt(prompt));
      });

      const token = await provider.obtainInteractive();
      const store = new CredentialStore({ path: config.tokenFile });
      await store.persist(token);
      console.log(`Token ${tokenFingerprint(token)} saved to ${store.path}`);
    } catch (err) {
      console.error('Login failed:', err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });

export const logoutCommand = new Command('logout')
  .description('Remove the cached token')
  .addOption(tokenFileOption())
  .action(async (options: CommonOptions) => {
    try {
      const config = resolveConfig(toConfigInput(options));
      const store = new CredentialStore({ path: config.tokenFile });
      if (await store.clear()) {
        console.log(`Removed ${store.path}`);
      } else {
        console.log(`No cached token at ${store.path}`);
      }
    } catch (err) {
      console.error('Logout failed:', err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });
