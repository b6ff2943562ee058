// API client module for authenticated requests

import { AuthManager } from '../auth/auth-manager';
import { ConfigManager } from '../config/index';
import { AuthError, HttpError } from '../errors/index';

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  method?: HttpMethod;
  body?: URLSearchParams | FormData;
}

export function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

export class APIClient {
  private authManager: AuthManager;
  private config: ConfigManager;

  constructor(authManager: AuthManager, config: ConfigManager) {
    this.authManager = authManager;
    this.config = config;
  }

  /**
   * Make authenticated request.
   * Redirects are never followed; one pointing at the identity provider means
   * the session cookie has expired.
   */
  async makeRequest(url: string, options: RequestOptions = {}): Promise<Response> {
    const session = await this.authManager.buildSession();
    const target = new URL(url, this.config.getPortalConfig().baseUrl);
    const method = options.method ?? 'GET';

    const headers: Record<string, string> = {};
    if (target.host === session.host) {
      headers['Cookie'] = session.cookieHeader;
    }

    if (this.config.isDebugMode()) {
      console.log(`APIClient: ${method} ${target.toString()}`);
    }

    let response: Response;
    try {
      response = await fetch(target.toString(), {
        method,
        headers,
        body: options.body,
        redirect: 'manual'
      });
    } catch (error) {
      console.error('APIClient: Request failed:', error);
      throw error;
    }

    if (isRedirect(response.status)) {
      const location = response.headers.get('location');
      if (location && this.isIdentityProvider(location, target)) {
        throw new AuthError('Session expired, copy a fresh session cookie');
      }
    }

    return response;
  }

  private isIdentityProvider(location: string, requestUrl: URL): boolean {
    try {
      return new URL(location, requestUrl).hostname === this.config.getPortalConfig().idpHost;
    } catch {
      return false;
    }
  }

  /**
   * Make GET request
   */
  async get(url: string): Promise<Response> {
    return this.makeRequest(url, { method: 'GET' });
  }

  /**
   * Make POST request
   */
  async post(url: string, body: URLSearchParams | FormData): Promise<Response> {
    return this.makeRequest(url, { method: 'POST', body });
  }

  /**
   * GET a page body; anything other than 2xx is an HttpError
   */
  async getText(url: string): Promise<string> {
    const response = await this.get(url);
    if (!response.ok) {
      throw new HttpError(`Failed to fetch ${url}`, response.status, url, response.headers.get('location'));
    }
    return response.text();
  }
}
