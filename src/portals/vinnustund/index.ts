/**
 * Vinnustund portal client
 *
 * ```typescript
 * import { SessionManager, createShiftRetrievalService } from 'vinnustund-shift-api';
 *
 * const sessions = new SessionManager({ credentials: { username: 'jon', password: '...' } });
 * const shifts = createShiftRetrievalService(sessions);
 * const result = await shifts.retrieveShifts('01.01.2026', '25.01.2026');
 * ```
 */

// Main service (recommended)
export {
  ShiftRetrievalService,
  createShiftRetrievalService,
  type ShiftRetrievalConfig
} from './client.js';

// Session handling
export {
  SessionManager,
  type SessionManagerConfig,
  type AuthenticatedRequestOptions
} from './auth/session-manager.js';

// Parsing
export {
  extractHiddenFields,
  extractFormAction,
  isLoginLocation,
  detectExpiry,
  parseShiftTable,
  normalizeCellText,
  type ShiftTableParserOptions
} from './http/index.js';

export { isValidPortalDate, validateDateRange } from './validation.js';

export * from './types/index.js';
