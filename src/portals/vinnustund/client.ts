/**
 * ShiftRetrievalService - the one business operation
 *
 * "Give me shifts between two dates", on top of a SessionManager.
 *
 * ## Query Flow
 *
 * 1. Validate `dateFrom` / `dateTo` (dd.MM.yyyy), no network before this
 * 2. `SessionManager.ensureValid()`
 * 3. GET the timesheet view → read the `detail_form` hidden fields
 * 4. POST the form with `timabilFra` / `timabilTil` set to the range
 * 5. Parse `table.clsTableControl`
 *
 * If step 3 or 4 shows an expired session, the service logs in once and runs
 * steps 3-4 once more. A second expiry is reported as `SessionExpired`.
 *
 * @example
 * ```typescript
 * const sessions = new SessionManager({ credentials: { username: 'jon', password: '...' } });
 * const shifts = createShiftRetrievalService(sessions);
 *
 * const result = await shifts.retrieveShifts('01.01.2026', '25.01.2026');
 * console.log(result.count);
 * sessions.close();
 * ```
 */

import type { FetchedPage } from '../../shared/utils/http-client.js';
import { createLogger, redactSensitive, type LogLevel, type Logger } from '../../shared/utils/logger.js';
import { Helpers, NO_DELAY, getErrorMessage, type DelayRange } from '../../shared/utils/helpers.js';
import { RemoteError, SessionExpiredError } from '../../shared/errors.js';
import type { SessionManager } from './auth/session-manager.js';
import { extractHiddenFields } from './http/form-parser.js';
import { parseShiftTable } from './http/shift-table-parser.js';
import { validateDateRange } from './validation.js';
import {
  SHIFT_QUERY_FIELDS,
  SHIFT_QUERY_FORM,
  type DateRange,
  type ExpiryReason,
  type Session,
  type ShiftsResponse
} from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ShiftRetrievalConfig {
  /** Random pause before each portal request (default: none) */
  requestDelay?: DelayRange;
  logLevel?: LogLevel;
}

type QueryOutcome =
  | { kind: 'expired'; reason: ExpiryReason }
  | { kind: 'page'; page: FetchedPage };

// ============================================================================
// ShiftRetrievalService
// ============================================================================

export class ShiftRetrievalService {
  private sessions: SessionManager;
  private requestDelay: DelayRange;
  private logger: Logger;
  private parserLogger: Logger;

  constructor(sessions: SessionManager, config: ShiftRetrievalConfig = {}) {
    this.sessions = sessions;
    this.requestDelay = config.requestDelay ?? NO_DELAY;
    this.logger = createLogger('ShiftRetrieval', { level: config.logLevel });
    this.parserLogger = this.logger.child('ShiftTableParser');
  }

  /**
   * Fetch and parse the shifts between two dd.MM.yyyy dates.
   * An empty list is a successful result.
   */
  async retrieveShifts(dateFrom: unknown, dateTo: unknown): Promise<ShiftsResponse> {
    const range = validateDateRange(dateFrom, dateTo);
    this.logger.info(`Retrieving shifts ${range.dateFrom} - ${range.dateTo}`);

    let session = await this.sessions.ensureValid();
    let outcome = await this.queryShifts(session, range);

    if (outcome.kind === 'expired') {
      this.logger.warn(`Session expired (${outcome.reason}), logging in again`);
      this.sessions.markExpired(session);

      try {
        session = await this.sessions.login();
      } catch (error: unknown) {
        throw new SessionExpiredError(`Session expired and relogin failed: ${getErrorMessage(error)}`, { cause: error });
      }

      outcome = await this.queryShifts(session, range);
      if (outcome.kind === 'expired') {
        this.sessions.markExpired(session);
        throw new SessionExpiredError(`Session still expired after relogin (${outcome.reason})`);
      }
    }

    const { page } = outcome;
    if (!Helpers.isSuccessStatus(page.status)) {
      throw new RemoteError(page.status, `Portal returned HTTP ${page.status} for ${page.url}`);
    }

    const shifts = parseShiftTable(page.html, { logger: this.parserLogger });
    this.logger.info(`✅ Retrieved ${shifts.length} shifts`);

    return {
      success: true,
      dateFrom: range.dateFrom,
      dateTo: range.dateTo,
      shifts,
      count: shifts.length
    };
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private async queryShifts(session: Session, range: DateRange): Promise<QueryOutcome> {
    const urls = this.sessions.urls;

    await Helpers.randomDelay(this.requestDelay);
    const formPage = await this.sessions.fetchAuthenticated(session, urls.probe);
    const formExpiry = this.sessions.detectExpiry(formPage);
    if (formExpiry) {
      return { kind: 'expired', reason: formExpiry };
    }
    if (!Helpers.isSuccessStatus(formPage.status)) {
      return { kind: 'page', page: formPage };
    }

    const fields = extractHiddenFields(formPage.html, SHIFT_QUERY_FORM);
    fields[SHIFT_QUERY_FIELDS.DATE_FROM] = range.dateFrom;
    fields[SHIFT_QUERY_FIELDS.DATE_TO] = range.dateTo;
    fields.sj = fields.sj || 'true';
    fields.showBak = fields.showBak || 'true';
    this.logger.debug('Shift query fields', redactSensitive(fields));

    await Helpers.randomDelay(this.requestDelay);
    const page = await this.sessions.fetchAuthenticated(session, urls.timesheet, {
      method: 'POST',
      body: new URLSearchParams(fields).toString(),
      headers: { 'Referer': formPage.url, 'Origin': urls.base }
    });

    const expiry = this.sessions.detectExpiry(page);
    if (expiry) {
      return { kind: 'expired', reason: expiry };
    }
    return { kind: 'page', page };
  }
}

/**
 * Create a ShiftRetrievalService bound to a SessionManager
 */
export function createShiftRetrievalService(sessions: SessionManager, config?: ShiftRetrievalConfig): ShiftRetrievalService {
  return new ShiftRetrievalService(sessions, config);
}
