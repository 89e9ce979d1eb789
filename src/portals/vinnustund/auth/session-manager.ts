/**
 * Vinnustund Session Manager
 *
 * Owns the single authenticated session for the portal and the cookie
 * plumbing around it. Callers get a Session from `ensureValid()` and pass it
 * back to `fetchAuthenticated()`; they never handle cookies themselves.
 *
 * ```typescript
 * const sessions = new SessionManager({
 *   credentials: { username: 'jon', password: '...' },
 *   refreshAutomatically: true,
 *   automaticRefreshPeriodMs: 4 * 60 * 60 * 1000
 * });
 * const session = await sessions.ensureValid();
 * const page = await sessions.fetchAuthenticated(session, sessions.urls.probe);
 * sessions.close();
 * ```
 *
 * Concurrency:
 * - `login()` is single-flight. A second caller while a login is running
 *   gets the same promise instead of starting another network login.
 * - The current Session is a frozen object and is only ever replaced whole.
 * - `isAuthenticated()` and `keepAlive()` read the current value and never
 *   wait on a running login.
 */

import {
  createCookieFetch,
  type CookieFetch,
  type FetchLike,
  type FetchedPage,
  type RequestOptions
} from '../../../shared/utils/http-client.js';
import { createLogger, truncateForLog, type LogLevel, type Logger } from '../../../shared/utils/logger.js';
import { Helpers, getErrorMessage } from '../../../shared/utils/helpers.js';
import { LoginError } from '../../../shared/errors.js';
import { detectExpiry, extractFormAction, extractHiddenFields, isLoginLocation } from '../http/form-parser.js';
import {
  DEFAULT_PAGE_MARKERS,
  DEFAULT_SESSION_COOKIE_NAMES,
  buildVinnustundUrls,
  type ExpiryReason,
  type PageMarkers,
  type Session,
  type SessionCookieNames,
  type VinnustundCredentials,
  type VinnustundUrls
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SessionManagerConfig {
  credentials: VinnustundCredentials;
  /** Portal root (default: https://kopavogur.vinnustund.is) */
  baseUrl?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeout?: number;
  userAgent?: string;
  /** Extra headers sent with every portal request */
  headers?: Record<string, string>;
  cookieNames?: SessionCookieNames;
  markers?: PageMarkers;
  /** Login form field names (default: username / password) */
  usernameField?: string;
  passwordField?: string;
  /** Log in again every `automaticRefreshPeriodMs` (default: false) */
  refreshAutomatically?: boolean;
  automaticRefreshPeriodMs?: number;
  /** Ping the portal every `keepAliveIntervalMs` (default: false) */
  keepAlive?: boolean;
  keepAliveIntervalMs?: number;
  fetch?: FetchLike;
  logLevel?: LogLevel;
}

export type AuthenticatedRequestOptions = Omit<RequestOptions, 'cookieHeader'>;

const DEFAULT_REFRESH_PERIOD_MS = 4 * 60 * 60 * 1000;
const DEFAULT_KEEP_ALIVE_INTERVAL_MS = 10 * 60 * 1000;

// ============================================================================
// Session Manager
// ============================================================================

export class SessionManager {
  readonly urls: VinnustundUrls;

  private credentials: VinnustundCredentials;
  private config: {
    timeout: number;
    userAgent?: string;
    headers: Record<string, string>;
    cookieNames: SessionCookieNames;
    markers: PageMarkers;
    usernameField: string;
    passwordField: string;
    fetch?: FetchLike;
    logLevel?: LogLevel;
  };
  private http: CookieFetch;
  private logger: Logger;

  private session: Session | null = null;
  private inflightLogin: Promise<Session> | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private keepAliveTimer: NodeJS.Timeout | null = null;

  constructor(config: SessionManagerConfig) {
    this.credentials = config.credentials;
    this.urls = buildVinnustundUrls(config.baseUrl);
    this.config = {
      timeout: config.timeout ?? 30000,
      userAgent: config.userAgent,
      headers: config.headers ?? {},
      cookieNames: config.cookieNames ?? DEFAULT_SESSION_COOKIE_NAMES,
      markers: config.markers ?? DEFAULT_PAGE_MARKERS,
      usernameField: config.usernameField ?? 'username',
      passwordField: config.passwordField ?? 'password',
      fetch: config.fetch,
      logLevel: config.logLevel
    };
    this.logger = createLogger('SessionManager', { level: config.logLevel });
    this.http = this.createHttp();

    this.logger.info(`SessionManager initialized for ${truncateForLog(this.credentials.username)} at ${this.urls.base}`);

    if (config.refreshAutomatically) {
      this.scheduleAutomaticRefresh(config.automaticRefreshPeriodMs ?? DEFAULT_REFRESH_PERIOD_MS);
    }
    if (config.keepAlive) {
      this.scheduleKeepAlive(config.keepAliveIntervalMs ?? DEFAULT_KEEP_ALIVE_INTERVAL_MS);
    }
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Log in and replace the current session. Concurrent calls share one login.
   * On failure the previous session is left as it was.
   */
  login(): Promise<Session> {
    if (!this.inflightLogin) {
      this.inflightLogin = this.performLogin().finally(() => {
        this.inflightLogin = null;
      });
    } else {
      this.logger.debug('Login already in progress, waiting for it');
    }
    return this.inflightLogin;
  }

  /**
   * Probe the portal with the current session. Never changes session state.
   */
  async isAuthenticated(): Promise<boolean> {
    const session = this.session;
    if (!session || session.expired) {
      return false;
    }

    try {
      const page = await this.fetchAuthenticated(session, this.urls.probe);
      const reason = this.detectExpiry(page);
      if (reason) {
        this.logger.info(`Probe says session is expired (${reason})`);
        return false;
      }
      return Helpers.isSuccessStatus(page.status);
    } catch (error: unknown) {
      this.logger.warn(`Authentication probe failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Current usable session, logging in first when there is none or it expired
   */
  async ensureValid(): Promise<Session> {
    const session = this.session;
    if (session && !session.expired) {
      return session;
    }
    return this.login();
  }

  /**
   * Mark `session` expired, unless a newer login has already replaced it
   */
  markExpired(session: Session): void {
    if (this.session !== session || session.expired) {
      return;
    }
    this.session = Object.freeze({ ...session, expired: true });
    this.logger.info(`Session from ${session.loggedInAt.toISOString()} marked expired`);
  }

  getCurrentSession(): Session | null {
    return this.session;
  }

  /**
   * Request a portal page with the cookies of `session`. A redirect to the
   * login page is returned as-is rather than followed.
   */
  async fetchAuthenticated(session: Session, url: string, options: AuthenticatedRequestOptions = {}): Promise<FetchedPage> {
    return this.http.fetchPage(url, {
      ...options,
      cookieHeader: this.buildCookieHeader(session),
      stopAt: isLoginLocation
    });
  }

  detectExpiry(page: FetchedPage): ExpiryReason | null {
    return detectExpiry(page, this.config.markers);
  }

  /**
   * Send one low-cost request to reset the portal's inactivity timer.
   * Returns false when there is no live session or the response looks expired.
   */
  async keepAlive(): Promise<boolean> {
    const session = this.session;
    if (!session || session.expired) {
      this.logger.debug('Keep-alive skipped: no live session');
      return false;
    }

    const page = await this.fetchAuthenticated(session, this.urls.keepAlive);
    const reason = this.detectExpiry(page);
    if (reason) {
      this.logger.warn(`Keep-alive response looks expired (${reason})`);
      return false;
    }
    this.logger.debug(`Keep-alive ok (${page.status})`);
    return true;
  }

  /**
   * Log in again every `periodMs`, whether or not expiry was observed
   */
  scheduleAutomaticRefresh(periodMs: number): void {
    this.stopTimer(this.refreshTimer);
    this.refreshTimer = setInterval(() => {
      void this.runScheduledRefresh();
    }, periodMs);
    this.refreshTimer.unref();
    this.logger.info(`Automatic relogin every ${Math.round(periodMs / 60000)} min`);
  }

  scheduleKeepAlive(intervalMs: number): void {
    this.stopTimer(this.keepAliveTimer);
    this.keepAliveTimer = setInterval(() => {
      void this.runScheduledKeepAlive();
    }, intervalMs);
    this.keepAliveTimer.unref();
    this.logger.info(`Keep-alive every ${Math.round(intervalMs / 60000)} min`);
  }

  /**
   * Stop background timers. A login already in flight still completes.
   */
  close(): void {
    this.stopTimer(this.refreshTimer);
    this.stopTimer(this.keepAliveTimer);
    this.refreshTimer = null;
    this.keepAliveTimer = null;
  }

  // ==========================================================================
  // Login flow
  // ==========================================================================

  private async performLogin(): Promise<Session> {
    // Fresh jar: cookies of an older session must never mix into the new set
    const http = this.createHttp();
    const { username, password } = this.credentials;

    this.logger.info(`Step 1: Loading login page for ${truncateForLog(username)}`);
    const loginPage = await this.loginRequest(() => http.fetchPage(this.urls.loginPage), 'load login page');
    if (!Helpers.isSuccessStatus(loginPage.status)) {
      throw new LoginError('TransportFailure', `Login page returned HTTP ${loginPage.status}`);
    }

    const hiddenFields = extractHiddenFields(loginPage.html);
    const action = extractFormAction(loginPage.html, loginPage.url) ?? this.urls.loginPage;
    this.logger.debug(`Login form: ${Object.keys(hiddenFields).length} hidden fields, action ${action}`);

    this.logger.info('Step 2: Submitting credentials');
    const body = new URLSearchParams({
      ...hiddenFields,
      [this.config.usernameField]: username,
      [this.config.passwordField]: password
    }).toString();

    const response = await this.loginRequest(() => http.fetchPage(action, {
      method: 'POST',
      body,
      headers: { 'Referer': loginPage.url, 'Origin': this.urls.base }
    }), 'submit login form');

    if (!Helpers.isSuccessStatus(response.status) && !Helpers.isRedirectStatus(response.status)) {
      throw new LoginError('TransportFailure', `Login POST returned HTTP ${response.status}`);
    }

    this.logger.info('Step 3: Checking session cookies');
    const cookies = new Map<string, string>();
    for (const cookie of await http.getCookies(this.urls.timesheet)) {
      cookies.set(cookie.key, cookie.value);
    }

    const names = this.config.cookieNames;
    const identityToken = cookies.get(names.identity);
    const sessionToken = cookies.get(names.session);
    const gatewayToken = cookies.get(names.gateway);

    // Identity and session tokens must come from the credentials POST itself;
    // the gateway cookie may already have been set by the login page.
    const issued = new Set(response.setCookieNames);
    const missing = [
      ...[names.identity, names.session].filter(name => !issued.has(name) || !cookies.get(name)),
      ...(cookies.get(names.gateway) ? [] : [names.gateway])
    ];

    if (!identityToken || !sessionToken || !gatewayToken || missing.length > 0) {
      throw new LoginError('CredentialsRejected', `Login rejected: missing session cookies ${missing.join(', ')}`);
    }

    const additionalCookies: Record<string, string> = {};
    for (const [name, value] of cookies) {
      if (name !== names.identity && name !== names.session && name !== names.gateway) {
        additionalCookies[name] = value;
      }
    }

    const session: Session = Object.freeze({
      identityToken,
      sessionToken,
      gatewayToken,
      additionalCookies: Object.freeze(additionalCookies),
      loggedInAt: new Date(),
      expired: false
    });
    this.session = session;

    this.logger.info(`✅ Logged in as ${truncateForLog(username)}`);
    return session;
  }

  private async loginRequest(request: () => Promise<FetchedPage>, step: string): Promise<FetchedPage> {
    try {
      return await request();
    } catch (error: unknown) {
      throw new LoginError('TransportFailure', `Could not ${step}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildCookieHeader(session: Session): string {
    const names = this.config.cookieNames;
    const pairs = [
      `${names.identity}=${session.identityToken}`,
      `${names.session}=${session.sessionToken}`,
      `${names.gateway}=${session.gatewayToken}`,
      ...Object.entries(session.additionalCookies).map(([name, value]) => `${name}=${value}`)
    ];
    return pairs.join('; ');
  }

  private createHttp(): CookieFetch {
    return createCookieFetch({
      timeout: this.config.timeout,
      userAgent: this.config.userAgent,
      headers: this.config.headers,
      fetch: this.config.fetch,
      logLevel: this.config.logLevel
    });
  }

  private async runScheduledRefresh(): Promise<void> {
    try {
      this.logger.info('Scheduled relogin');
      await this.login();
    } catch (error: unknown) {
      this.logger.error(`Scheduled relogin failed: ${getErrorMessage(error)}`, error);
    }
  }

  private async runScheduledKeepAlive(): Promise<void> {
    try {
      await this.keepAlive();
    } catch (error: unknown) {
      this.logger.error(`Keep-alive failed: ${getErrorMessage(error)}`, error);
    }
  }

  private stopTimer(timer: NodeJS.Timeout | null): void {
    if (timer) {
      clearInterval(timer);
    }
  }
}
