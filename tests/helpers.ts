// Shared test doubles: configuration, in-memory credential store and API client

import { APIClient } from '../src/modules/api/api-client';
import { AuthManager } from '../src/modules/auth/auth-manager';
import { CredentialStore, formatCredentialLine } from '../src/modules/auth/credential-store';
import { ConfigManager, UserSettings } from '../src/modules/config/index';
import { Credential } from '../src/types/index';

export const BASE_URL = 'https://brute.test/brute/';
export const IDP_HOST = 'idp.test';
export const TEST_COOKIE_LINE = '_shibsession_test=test-secret';

export class MemoryCredentialStore extends CredentialStore {
  line: string | null;

  constructor(line: string | null = TEST_COOKIE_LINE) {
    super('/memory/cookie');
    this.line = line;
  }

  async loadLine(): Promise<string | null> {
    return this.line;
  }

  async save(credential: Credential): Promise<void> {
    this.line = formatCredentialLine(credential);
  }
}

export function createTestConfig(settings: UserSettings = {}): ConfigManager {
  return new ConfigManager({ baseUrl: BASE_URL, idpHost: IDP_HOST, ...settings });
}

export function createTestClient(
  store: CredentialStore = new MemoryCredentialStore(),
  config: ConfigManager = createTestConfig()
): { config: ConfigManager; authManager: AuthManager; client: APIClient } {
  const authManager = new AuthManager(config, store);
  return { config, authManager, client: new APIClient(authManager, config) };
}
