import { DateTime } from 'luxon';
import { InvalidParametersError } from '../../shared/errors.js';
import { PORTAL_DATE_FORMAT, type DateRange } from './types/index.js';

const PORTAL_DATE_PATTERN = /^\d{2}\.\d{2}\.\d{4}$/;

/**
 * True for a calendar-valid date written exactly as dd.MM.yyyy
 */
export function isValidPortalDate(value: string): boolean {
  if (!PORTAL_DATE_PATTERN.test(value)) return false;
  return DateTime.fromFormat(value, PORTAL_DATE_FORMAT).isValid;
}

/**
 * Validate a caller-supplied date range. Ordering is left to the portal.
 */
export function validateDateRange(dateFrom: unknown, dateTo: unknown): DateRange {
  if (dateFrom === undefined || dateFrom === null || dateFrom === '' ||
      dateTo === undefined || dateTo === null || dateTo === '') {
    throw new InvalidParametersError('Both dateFrom and dateTo parameters are required');
  }

  if (typeof dateFrom !== 'string' || !isValidPortalDate(dateFrom)) {
    throw new InvalidParametersError(`Invalid dateFrom "${String(dateFrom)}", expected ${PORTAL_DATE_FORMAT}`);
  }
  if (typeof dateTo !== 'string' || !isValidPortalDate(dateTo)) {
    throw new InvalidParametersError(`Invalid dateTo "${String(dateTo)}", expected ${PORTAL_DATE_FORMAT}`);
  }

  return { dateFrom, dateTo };
}
