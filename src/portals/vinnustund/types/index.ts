// Centralized types for the Vinnustund portal

// ============================================================================
// URLs and constants
// ============================================================================

export const VINNUSTUND_DEFAULT_BASE_URL = 'https://kopavogur.vinnustund.is';

export const VINNUSTUND_PATHS = {
  LOGIN_PAGE: '/VS_MX/VSLogin.jsp',
  // Timesheet view; also the "am I logged in" probe when requested with ?sj=true
  TIMESHEET: '/VS_MX/starfsmadur/starfsm_timafaerslur_view.jsp'
};

export interface VinnustundUrls {
  base: string;
  loginPage: string;
  timesheet: string;
  probe: string;
  keepAlive: string;
}

export function buildVinnustundUrls(baseUrl: string = VINNUSTUND_DEFAULT_BASE_URL): VinnustundUrls {
  const base = baseUrl.replace(/\/+$/, '');
  const timesheet = `${base}${VINNUSTUND_PATHS.TIMESHEET}`;
  return {
    base,
    loginPage: `${base}${VINNUSTUND_PATHS.LOGIN_PAGE}`,
    timesheet,
    probe: `${timesheet}?sj=true`,
    keepAlive: base
  };
}

/** Names of the three cookies that together make up a session */
export interface SessionCookieNames {
  identity: string;
  session: string;
  gateway: string;
}

export const DEFAULT_SESSION_COOKIE_NAMES: SessionCookieNames = {
  identity: 'sessionPersist',
  session: 'JSESSIONID',
  gateway: 'TS01780571'
};

/** Markers used to tell a login page or a truncated response from real content */
export interface PageMarkers {
  /** Present on the login page */
  loginForm: string;
  /** Present on authenticated content pages */
  authenticatedContent: string;
  /** Bodies shorter than this are never real content */
  minContentLength: number;
}

export const SHIFT_QUERY_FORM = 'detail_form';
export const SHIFT_TABLE_CLASS = 'clsTableControl';

export const DEFAULT_PAGE_MARKERS: PageMarkers = {
  loginForm: 'name="password"',
  authenticatedContent: SHIFT_QUERY_FORM,
  minContentLength: 512
};

export const SHIFT_QUERY_FIELDS = {
  DATE_FROM: 'timabilFra',
  DATE_TO: 'timabilTil'
};

/** Portal date format, e.g. 02.01.2026 */
export const PORTAL_DATE_FORMAT = 'dd.MM.yyyy';

// ============================================================================
// Session
// ============================================================================

export interface VinnustundCredentials {
  username: string;
  password: string;
}

/**
 * One authenticated identity. Always replaced as a whole; never edited.
 */
export interface Session {
  readonly identityToken: string;
  readonly sessionToken: string;
  readonly gatewayToken: string;
  /** Any other cookies the same login exchange issued */
  readonly additionalCookies: Readonly<Record<string, string>>;
  readonly loggedInAt: Date;
  readonly expired: boolean;
}

/** Hidden field name → value, scraped right before a form POST */
export type LoginFormFields = Record<string, string>;

export type ExpiryReason = 'login-redirect' | 'login-form' | 'too-short';

// ============================================================================
// Shift records
// ============================================================================

export interface PayElements {
  readonly payElement1: string;
  readonly payElement2: string;
  readonly payElement3: string;
  readonly payElement4: string;
  readonly payElement5: string;
}

export interface ShiftRecord {
  readonly dayOfWeek: string;
  readonly date: string;
  readonly workHours: string;
  readonly workHoursExtra: string;
  readonly note: string;
  readonly clockIn: string;
  readonly timeEntered: string;
  readonly timeEnteredTitle: string;
  readonly calculationMethod: string;
  readonly totalHours: string;
  readonly absenceSupplement: string;
  readonly hoursUnits: string;
  readonly remark: string;
  readonly statusShift: string;
  readonly statusShiftTitle: string;
  readonly statusTime: string;
  readonly statusTimeTitle: string;
  readonly payElements: PayElements;
  /** Non-empty cell texts joined with " | "; diagnostics only */
  readonly rawText: string;
}

export interface DateRange {
  dateFrom: string;
  dateTo: string;
}

export interface ShiftsResponse {
  success: true;
  dateFrom: string;
  dateTo: string;
  shifts: ShiftRecord[];
  count: number;
}
