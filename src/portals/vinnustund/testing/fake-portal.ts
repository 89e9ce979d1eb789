/**
 * In-process stand-in for the Vinnustund portal
 *
 * Implements just enough of the portal behind a `FetchLike` so the session
 * and retrieval code can be exercised without a network:
 *
 * - GET  /VS_MX/VSLogin.jsp          login page (pre-login cookies)
 * - POST /VS_MX/VSLoginServlet       302 + session cookies, or the login page again
 * - GET  /VS_MX/starfsmadur/...view  timesheet form (302 to login when not authenticated)
 * - POST /VS_MX/starfsmadur/...view  shift page for the posted range
 * - GET  /                           keep-alive target
 *
 * Only the newest login's JSESSIONID is accepted.
 */

import type { FetchLike } from '../../../shared/utils/http-client.js';
import { Helpers } from '../../../shared/utils/helpers.js';
import { VINNUSTUND_PATHS } from '../types/index.js';
import { loadFixture } from './fixtures.js';

export const FAKE_PORTAL_BASE_URL = 'https://portal.example.com';

const LOGIN_ACTION_PATH = '/VS_MX/VSLoginServlet';
const LANDING_PATH = '/VS_MX/starfsmadur/forsida.jsp';
const LOGIN_TOKEN = 'abc123';

export interface FakePortalOptions {
  username?: string;
  password?: string;
  /** Delay applied while a login POST is being handled */
  loginLatencyMs?: number;
  /** Page returned for a shift query POST */
  shiftPageHtml?: string;
  /** Extra Set-Cookie headers sent with the login page */
  loginPageCookies?: string[];
}

export class FakePortal {
  readonly username: string;
  readonly password: string;
  loginLatencyMs: number;
  shiftPageHtml: string;
  loginPageCookies: string[];

  /** Every request received */
  requests = 0;
  loginAttempts = 0;
  /** Successful logins; login N issues tokens ending in -N */
  loginCount = 0;
  activeLogins = 0;
  maxConcurrentLogins = 0;
  timesheetGets = 0;
  timesheetPosts = 0;
  keepAliveHits = 0;
  /** While positive, timesheet GETs are answered with a login redirect */
  expireNextQueries = 0;
  /** When set, every request fails like an unreachable host */
  networkDown = false;
  /** Status for shift query POSTs (default 200) */
  shiftQueryStatus = 200;
  lastQuery: URLSearchParams | null = null;
  lastLoginForm: URLSearchParams | null = null;

  constructor(options: FakePortalOptions = {}) {
    this.username = options.username ?? 'test-user';
    this.password = options.password ?? 'test-secret';
    this.loginLatencyMs = options.loginLatencyMs ?? 0;
    this.shiftPageHtml = options.shiftPageHtml ?? loadFixture('shift-page-single.html');
    this.loginPageCookies = options.loginPageCookies ?? [];
  }

  readonly fetch: FetchLike = async (input, init) => {
    this.requests++;
    if (this.networkDown) {
      throw new TypeError('fetch failed');
    }

    const url = new URL(input);
    const method = (init?.method ?? 'GET').toUpperCase();
    const headers = new Headers(init?.headers);
    const cookies = parseCookieHeader(headers.get('cookie') ?? '');
    const body = typeof init?.body === 'string' ? init.body : '';

    if (url.pathname === VINNUSTUND_PATHS.LOGIN_PAGE && method === 'GET') {
      return html(loginPageHtml(), 200, [
        'JSESSIONID=anon; Path=/VS_MX; HttpOnly',
        'TS01780571=gw-pre; Path=/',
        ...this.loginPageCookies
      ]);
    }

    if (url.pathname === LOGIN_ACTION_PATH && method === 'POST') {
      return this.handleLogin(new URLSearchParams(body));
    }

    if (url.pathname === LANDING_PATH && method === 'GET') {
      return this.isAuthenticated(cookies) ? html(padPage('Forsíða')) : redirect(VINNUSTUND_PATHS.LOGIN_PAGE);
    }

    if (url.pathname === VINNUSTUND_PATHS.TIMESHEET) {
      return method === 'POST' ? this.handleShiftQuery(cookies, body) : this.handleTimesheetForm(cookies);
    }

    if (url.pathname === '/' && method === 'GET') {
      this.keepAliveHits++;
      return this.isAuthenticated(cookies) ? html(padPage('Vinnustund')) : redirect(VINNUSTUND_PATHS.LOGIN_PAGE);
    }

    return html('Not found', 404);
  };

  private async handleLogin(form: URLSearchParams): Promise<Response> {
    this.loginAttempts++;
    this.lastLoginForm = form;

    if (form.get('__token') !== LOGIN_TOKEN) {
      return html('Forbidden', 403);
    }

    this.activeLogins++;
    this.maxConcurrentLogins = Math.max(this.maxConcurrentLogins, this.activeLogins);
    try {
      if (this.loginLatencyMs > 0) {
        await Helpers.delay(this.loginLatencyMs);
      }
    } finally {
      this.activeLogins--;
    }

    if (form.get('username') !== this.username || form.get('password') !== this.password) {
      return html(loginPageHtml());
    }

    this.loginCount++;
    const n = this.loginCount;
    return redirect(LANDING_PATH, [
      `JSESSIONID=sess-${n}; Path=/VS_MX; HttpOnly`,
      `sessionPersist=id-${n}; Path=/`,
      `TS01780571=gw-${n}; Path=/`,
      `bgid=bg-${n}; Path=/`
    ]);
  }

  private handleTimesheetForm(cookies: Map<string, string>): Response {
    this.timesheetGets++;
    if (this.expireNextQueries > 0) {
      this.expireNextQueries--;
      return redirect(VINNUSTUND_PATHS.LOGIN_PAGE);
    }
    if (!this.isAuthenticated(cookies)) {
      return redirect(VINNUSTUND_PATHS.LOGIN_PAGE);
    }
    return html(loadFixture('timesheet-page.html'));
  }

  private handleShiftQuery(cookies: Map<string, string>, body: string): Response {
    this.timesheetPosts++;
    if (!this.isAuthenticated(cookies)) {
      return redirect(VINNUSTUND_PATHS.LOGIN_PAGE);
    }
    this.lastQuery = new URLSearchParams(body);
    return html(this.shiftPageHtml, this.shiftQueryStatus);
  }

  private isAuthenticated(cookies: Map<string, string>): boolean {
    const n = this.loginCount;
    return n > 0 &&
      cookies.get('JSESSIONID') === `sess-${n}` &&
      cookies.get('sessionPersist') === `id-${n}` &&
      cookies.get('TS01780571') === `gw-${n}`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function loginPageHtml(): string {
  return loadFixture('login-page.html');
}

function padPage(title: string): string {
  return `<html><head><title>${title}</title></head><body>${'<p>Vinnustund</p>\n'.repeat(40)}</body></html>`;
}

function html(body: string, status: number = 200, setCookies: string[] = []): Response {
  const headers = new Headers({ 'Content-Type': 'text/html; charset=utf-8' });
  for (const cookie of setCookies) {
    headers.append('Set-Cookie', cookie);
  }
  return new Response(body, { status, headers });
}

function redirect(path: string, setCookies: string[] = []): Response {
  const headers = new Headers({ 'Location': `${FAKE_PORTAL_BASE_URL}${path}` });
  for (const cookie of setCookies) {
    headers.append('Set-Cookie', cookie);
  }
  return new Response('', { status: 302, headers });
}

function parseCookieHeader(header: string): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const pair of header.split(';')) {
    const index = pair.indexOf('=');
    if (index > 0) {
      cookies.set(pair.slice(0, index).trim(), pair.slice(index + 1).trim());
    }
  }
  return cookies;
}
