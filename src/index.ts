/**
 * Vinnustund Shift API - shift records from the Vinnustund time portal
 *
 * @example
 * ```typescript
 * import { SessionManager, createShiftRetrievalService } from 'vinnustund-shift-api';
 *
 * const sessions = new SessionManager({
 *   credentials: { username: 'jon', password: 'your_password' }
 * });
 * const shifts = createShiftRetrievalService(sessions);
 *
 * const result = await shifts.retrieveShifts('01.01.2026', '25.01.2026');
 * console.log(`${result.count} shifts`);
 * sessions.close();
 * ```
 */

// ============================================================================
// Vinnustund portal
// ============================================================================

export * from './portals/vinnustund/index.js';

// ============================================================================
// HTTP layer
// ============================================================================

export {
  createApp,
  readDateParams,
  errorResponse,
  retrieveShiftsRoute,
  testAuthRoute,
  healthRoute,
  type AppDependencies,
  type ErrorBody,
  type AuthCheckBody,
  type RouteResult,
  type DateParams
} from './server/app.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  loadConfig,
  loadEnv,
  toSessionManagerConfig,
  ConfigError,
  type AppConfig,
  type Env
} from './config/index.js';

// ============================================================================
// Shared Utilities
// ============================================================================

export * from './shared/index.js';
