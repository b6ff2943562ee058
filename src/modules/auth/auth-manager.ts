// Authentication management module

import { ConfigManager } from '../config/index';
import { AuthError } from '../errors/index';
import { Credential, SessionHandle } from '../../types/index';
import { CredentialStore, parseCredentialLine } from './credential-store';

export class AuthManager {
  private config: ConfigManager;
  private store: CredentialStore;

  constructor(config: ConfigManager, store?: CredentialStore) {
    this.config = config;
    this.store = store ?? new CredentialStore(config.getCredentialsConfig().path);
  }

  /**
   * Read and validate the stored session credential.
   * The file is re-read on every call; it belongs to whoever maintains it.
   */
  async getCredential(): Promise<Credential> {
    const line = await this.store.loadLine();
    if (line === null) {
      throw new AuthError(`No session cookie stored in ${this.store.getPath()}`);
    }

    const credential = parseCredentialLine(line);
    if (!credential) {
      throw new AuthError('Stored session cookie is not in <name>=<value> form');
    }

    return this.validateCredential(credential);
  }

  /**
   * Check the prefix of the cookie name and that a value is present
   */
  validateCredential(credential: Credential): Credential {
    const { cookiePrefix } = this.config.getPortalConfig();

    if (!credential.name.startsWith(cookiePrefix)) {
      throw new AuthError(`Session cookie name must start with ${cookiePrefix}`);
    }
    if (!credential.value) {
      throw new AuthError('Session cookie has an empty value');
    }

    return credential;
  }

  /**
   * Build the per-request session for the portal host
   */
  async buildSession(): Promise<SessionHandle> {
    const credential = await this.getCredential();
    const host = new URL(this.config.getPortalConfig().baseUrl).host;

    return {
      host,
      cookieHeader: `${credential.name}=${credential.value}`
    };
  }

  /**
   * Validate and persist a newly copied cookie
   */
  async storeCredential(credential: Credential): Promise<void> {
    await this.store.save(this.validateCredential(credential));
  }
}
