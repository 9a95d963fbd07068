/**
 * File-backed cache for the authentication token.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ErrorCode, RelayError } from '../types/errors.js';
import { Token, serializeToken, tokenFileSchema } from './token.js';

/** Default cache file, relative to the working directory */
export const DEFAULT_TOKEN_FILE = 'token.tok';

export interface CredentialStoreOptions {
  /** Path of the token file (default: token.tok) */
  path?: string;
}

export class CredentialStore {
  readonly path: string;

  constructor(options: CredentialStoreOptions = {}) {
    this.path = path.resolve(options.path ?? DEFAULT_TOKEN_FILE);
  }

  /**
   * Read the cached token.
   * A missing, unreadable or malformed file is reported as not found.
   */
  async load(): Promise<Token> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.path, 'utf8');
    } catch (err) {
      throw new RelayError(
        ErrorCode.ERR_CREDENTIALS_NOT_FOUND,
        `No cached token at ${this.path}`,
        { cause: err }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new RelayError(
        ErrorCode.ERR_CREDENTIALS_NOT_FOUND,
        `Cached token at ${this.path} is not valid JSON`,
        { cause: err }
      );
    }

    const parsed = tokenFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new RelayError(
        ErrorCode.ERR_CREDENTIALS_NOT_FOUND,
        `Cached token at ${this.path} is malformed`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Write the token, replacing any previous file
   */
  async persist(token: Token): Promise<void> {
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
      await fs.promises.writeFile(tmpPath, serializeToken(token), { mode: 0o600 });
      await fs.promises.rename(tmpPath, this.path);
    } catch (err) {
      throw new RelayError(
        ErrorCode.ERR_PERSIST_FAILED,
        `Failed to write token to ${this.path}`,
        { cause: err }
      );
    }
  }

  /**
   * Remove the cached token. Returns false when there was none.
   */
  async clear(): Promise<boolean> {
    try {
      await fs.promises.unlink(this.path);
      return true;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }
}
