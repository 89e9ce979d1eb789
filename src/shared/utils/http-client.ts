/**
 * Shared HTTP Client Utilities
 *
 * Provides the HTTP plumbing for portal sessions:
 * - Cookie jar management with tough-cookie
 * - Per-request timeout (reported as a transport failure)
 * - Manual redirect following that can stop at a given location
 * - Standardized browser-like headers
 *
 * ## CookieFetch
 *
 * ```typescript
 * const http = createCookieFetch({ timeout: 15000 });
 * const page = await http.fetchPage('https://example.com/login');
 * await http.fetchPage('https://example.com/login', {
 *   method: 'POST',
 *   body: new URLSearchParams({ user: 'foo', pass: 'bar' }).toString()
 * });
 * ```
 *
 * Passing `cookieHeader` bypasses the jar entirely: the given header is sent
 * and cookies set by the response are not stored. The timeout covers the
 * response body as well as the headers. Session-bound requests use
 * this so the cookies in use always come from one login exchange.
 */

import { CookieJar, Cookie } from 'tough-cookie';
import { TransportError } from '../errors.js';
import { Helpers, getErrorMessage } from './helpers.js';
import { createLogger, truncateForLog, type LogLevel, type Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Custom user agent */
  userAgent?: string;
  /** Accept language header */
  acceptLanguage?: string;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Maximum redirects followed by fetchPage (default: 5) */
  maxRedirects?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Log level */
  logLevel?: LogLevel;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** Send this Cookie header instead of the jar's cookies */
  cookieHeader?: string;
}

export interface FetchPageOptions extends RequestOptions {
  /** Return the redirect response instead of following it when this matches the target */
  stopAt?: (location: string) => boolean;
}

export interface HttpResponse {
  status: number;
  /** Raw Location header */
  location: string | null;
  html: string;
  /** Names of the cookies this response set */
  setCookieNames: string[];
}

export interface FetchedPage {
  status: number;
  /** URL of the request that produced this response */
  url: string;
  /** Absolute redirect target, when the page is a redirect that was not followed */
  location?: string;
  html: string;
  /** Names of the cookies set along the way, redirect hops included */
  setCookieNames: string[];
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar
// ============================================================================

export class CookieFetch {
  private readonly cookieJar: CookieJar;
  private config: Required<Omit<HttpClientConfig, 'fetch' | 'logLevel'>>;
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? 30000,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      acceptLanguage: config.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE,
      headers: config.headers ?? {},
      maxRedirects: config.maxRedirects ?? 5
    };
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = createLogger('HTTP', { level: config.logLevel });
  }

  /**
   * Make a single HTTP request and read its body, all under one timeout.
   * Redirects are never followed here so that cookies set on intermediate
   * hops are captured.
   */
  async request(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const method = options.method ?? 'GET';

    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      'Connection': 'keep-alive',
      'Upgrade-Insecure-Requests': '1',
      'Cache-Control': 'max-age=0',
      ...this.config.headers,
      ...(options.headers ?? {})
    };

    const useJar = options.cookieHeader === undefined;
    const cookieString = useJar ? await this.cookieJar.getCookieString(url) : options.cookieHeader;
    if (cookieString) {
      headers['Cookie'] = cookieString;
    }

    if (method === 'POST' && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      this.logger.debug(`[${method}] ${url}`);

      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body,
        redirect: 'manual',
        signal: controller.signal
      });

      const setCookieHeaders = response.headers.getSetCookie();
      if (useJar) {
        await this.storeCookies(setCookieHeaders, url);
      }

      this.logger.debug(`[Response] ${response.status} ${response.statusText}`);
      const html = await readBody(response, controller.signal);

      return {
        status: response.status,
        location: response.headers.get('location'),
        html,
        setCookieNames: cookieNames(setCookieHeaders)
      };

    } catch (error: unknown) {
      if (controller.signal.aborted) {
        throw new TransportError(`Request timeout after ${this.config.timeout}ms: ${method} ${url}`, { cause: error });
      }
      throw new TransportError(`Request failed: ${method} ${url}: ${getErrorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Request a page and follow redirects (as GET) until a non-redirect response,
   * a redirect matching `stopAt`, or the redirect limit.
   */
  async fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
    const { stopAt, ...requestOptions } = options;
    let currentUrl = url;
    let current: RequestOptions = requestOptions;
    const setCookieNames: string[] = [];

    for (let redirects = 0; ; redirects++) {
      const response = await this.request(currentUrl, current);
      setCookieNames.push(...response.setCookieNames);

      if (!Helpers.isRedirectStatus(response.status) || !response.location) {
        return { status: response.status, url: currentUrl, html: response.html, setCookieNames };
      }

      const location = new URL(response.location, currentUrl).href;

      if (stopAt?.(location) || redirects >= this.config.maxRedirects) {
        if (redirects >= this.config.maxRedirects) {
          this.logger.warn(`Stopped after ${redirects} redirects at ${currentUrl}`);
        }
        return { status: response.status, url: currentUrl, location, html: response.html, setCookieNames };
      }

      this.logger.debug(`[Redirect] ${response.status} -> ${location}`);
      currentUrl = location;
      current = { headers: current.headers, cookieHeader: current.cookieHeader, method: 'GET' };
    }
  }

  /**
   * Get all cookies the jar would send to a URL
   */
  async getCookies(url: string): Promise<Cookie[]> {
    return this.cookieJar.getCookies(url);
  }

  private async storeCookies(setCookieHeaders: string[], url: string): Promise<void> {
    for (const header of setCookieHeaders) {
      try {
        await this.cookieJar.setCookie(header, url);
        const cookie = Cookie.parse(header);
        if (cookie) {
          this.logger.debug(`[Cookie] Set: ${cookie.key}=${truncateForLog(cookie.value, 4)}`);
        }
      } catch (error: unknown) {
        this.logger.debug(`[Cookie] Rejected for ${url}: ${getErrorMessage(error)}`);
      }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Read the body, failing as soon as `signal` aborts. A fetch implementation
 * that ignores the signal can leave its stream open; the read is abandoned then.
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    void response.text().then(
      html => {
        signal.removeEventListener('abort', onAbort);
        resolve(html);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function cookieNames(setCookieHeaders: string[]): string[] {
  const names: string[] = [];
  for (const header of setCookieHeaders) {
    const cookie = Cookie.parse(header);
    if (cookie) {
      names.push(cookie.key);
    }
  }
  return names;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new CookieFetch instance
 */
export function createCookieFetch(config?: HttpClientConfig): CookieFetch {
  return new CookieFetch(config);
}
