/**
 * MediaWiki API Client
 *
 * Cookie-carrying HTTP session for the MediaWiki action API. One client is one
 * logged-in session; call close() when the run is over.
 */

import {
  AuthenticationError,
  MalformedResponseError,
  TokenFetchError,
  TransportError,
} from '../errors.js';
import type { RunConfig } from '../config/run.js';
import type {
  QueryResponse,
  LoginResponse,
  SetPageLanguageParams,
  TokenType,
} from './types.js';

/** Minimal fetch signature the client relies on */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Client configuration */
export interface ClientConfig {
  /** Wiki API URL (e.g., https://wiki.example.org/w/api.php) */
  apiUrl: string;
  /** User agent string */
  userAgent?: string;
  /** Rate limit for write operations (ms between requests) */
  rateLimitWriteMs?: number;
  /** Request timeout (ms) */
  timeoutMs?: number;
  /** fetch implementation, defaults to the global one */
  fetch?: FetchLike;
}

type RequestParams = Record<string, string | number | undefined>;

/** Default configuration */
const DEFAULT_CONFIG: Required<Omit<ClientConfig, 'apiUrl' | 'fetch'>> = {
  userAgent: 'Pagelang/1.0',
  rateLimitWriteMs: 0,
  timeoutMs: 30000,
};

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * MediaWiki API Client
 */
export class MediaWikiClient {
  private config: Required<Omit<ClientConfig, 'fetch'>>;
  private fetchImpl: FetchLike;
  private lastWriteTime: number = 0;
  private csrfToken: string | null = null;
  private isLoggedIn: boolean = false;
  private cookies: Map<string, string> = new Map();

  constructor(config: ClientConfig) {
    const { fetch: fetchImpl, ...rest } = config;
    this.config = {
      ...DEFAULT_CONFIG,
      ...rest,
    };
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /**
   * Space out write requests
   */
  private async rateLimit(): Promise<void> {
    const delay = this.config.rateLimitWriteMs;
    const elapsed = Date.now() - this.lastWriteTime;

    if (this.lastWriteTime > 0 && elapsed < delay) {
      await sleep(delay - elapsed);
    }

    this.lastWriteTime = Date.now();
  }

  /**
   * Build cookie header from stored cookies
   */
  private getCookieHeader(): string {
    const parts: string[] = [];
    for (const [key, value] of this.cookies) {
      parts.push(`${key}=${value}`);
    }
    return parts.join('; ');
  }

  /**
   * Parse and store cookies from response
   */
  private storeCookies(response: Response): void {
    for (const cookieStr of response.headers.getSetCookie()) {
      const match = cookieStr.match(/^([^=]+)=([^;]*)/);
      if (match) {
        this.cookies.set(match[1].trim(), match[2].trim());
      }
    }
  }

  private encodeParams(params: RequestParams): URLSearchParams {
    const encoded = new URLSearchParams();
    encoded.set('format', 'json');

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        encoded.set(key, String(value));
      }
    }

    return encoded;
  }

  /**
   * Make a single request with timeout. There are no retries.
   */
  private async request(method: 'GET' | 'POST', params: RequestParams): Promise<unknown> {
    if (method === 'POST') {
      await this.rateLimit();
    }

    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
    };

    if (this.cookies.size > 0) {
      headers['Cookie'] = this.getCookieHeader();
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    let text: string;
    try {
      if (method === 'GET') {
        const url = new URL(this.config.apiUrl);
        for (const [key, value] of this.encodeParams(params)) {
          url.searchParams.set(key, value);
        }

        response = await this.fetchImpl(url.toString(), { headers, signal: controller.signal });
      } else {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';

        response = await this.fetchImpl(this.config.apiUrl, {
          method: 'POST',
          headers,
          body: this.encodeParams(params).toString(),
          signal: controller.signal,
        });
      }

      this.storeCookies(response);

      if (!response.ok) {
        const statusText = response.statusText ? `: ${response.statusText}` : '';
        throw new TransportError(`HTTP ${response.status}${statusText}`, response.status);
      }

      text = await response.text();
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timed out after ${this.config.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request failed: ${message}`);
    } finally {
      clearTimeout(timeout);
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedResponseError(response.status);
    }
  }

  /**
   * Make a GET request to the API
   */
  async get(params: RequestParams): Promise<unknown> {
    return this.request('GET', params);
  }

  /**
   * Make a POST request to the API
   */
  async post(params: RequestParams): Promise<unknown> {
    return this.request('POST', params);
  }

  // =========================================================================
  // Authentication
  // =========================================================================

  /**
   * Fetch a token of the given type. csrf is the API default, so no type is sent for it.
   */
  private async fetchToken(type: TokenType): Promise<string> {
    let result: QueryResponse;
    try {
      result = await this.get({
        action: 'query',
        meta: 'tokens',
        type: type === 'csrf' ? undefined : type,
      }) as QueryResponse;
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        throw new TokenFetchError(type, error.message);
      }
      throw error;
    }

    const key = `${type}token` as const;
    const token = result?.query?.tokens?.[key];
    if (typeof token !== 'string' || token.length === 0) {
      throw new TokenFetchError(type, result?.error?.info);
    }
    return token;
  }

  /**
   * Login with bot credentials
   */
  async login(username: string, password: string): Promise<void> {
    const loginToken = await this.fetchToken('login');

    const loginResult = await this.post({
      action: 'login',
      lgname: username,
      lgpassword: password,
      lgtoken: loginToken,
    }) as LoginResponse;

    if (loginResult?.login?.result !== 'Success') {
      throw new AuthenticationError(loginResult?.login?.reason ?? loginResult?.error?.info ?? 'Unknown reason');
    }

    this.isLoggedIn = true;
    this.csrfToken = null; // Clear cached token, will be fetched on demand
  }

  /**
   * Get CSRF token (required for write operations)
   */
  async getCsrfToken(): Promise<string> {
    if (!this.isLoggedIn) {
      throw new AuthenticationError('not logged in');
    }

    if (this.csrfToken) {
      return this.csrfToken;
    }

    this.csrfToken = await this.fetchToken('csrf');
    return this.csrfToken;
  }

  /**
   * Check if logged in
   */
  get loggedIn(): boolean {
    return this.isLoggedIn;
  }

  // =========================================================================
  // Write operations
  // =========================================================================

  /**
   * Set the content language of a page. Returns the raw response body.
   */
  async setPageLanguage(params: SetPageLanguageParams): Promise<unknown> {
    return this.post({
      action: 'setpagelanguage',
      title: params.title,
      token: params.token,
      lang: params.language,
      reason: params.reason,
    });
  }

  // =========================================================================
  // Utility methods
  // =========================================================================

  /**
   * Drop the session: cookies, cached token and login state
   */
  close(): void {
    this.cookies.clear();
    this.csrfToken = null;
    this.isLoggedIn = false;
  }
}

/**
 * Create a client from the run configuration
 */
export function createClient(config: RunConfig, fetchImpl?: FetchLike): MediaWikiClient {
  return new MediaWikiClient({
    apiUrl: config.apiUrl,
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    rateLimitWriteMs: config.rateLimitWriteMs,
    fetch: fetchImpl,
  });
}
