/**
 * HTTP routes
 *
 * - GET|POST /retrieve_shifts  dateFrom / dateTo from query, JSON or form body
 * - GET      /test_auth        probe the portal session
 * - GET      /health           liveness, no session needed
 *
 * Each route is a plain async function returning `{ status, body }`; the
 * Express layer only reads the request and writes the result.
 */

import express, { Router, type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import { isShiftServiceError, type ErrorKind } from '../shared/errors.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';
import type { ShiftRetrievalService } from '../portals/vinnustund/client.js';
import type { SessionManager } from '../portals/vinnustund/auth/session-manager.js';
import type { ShiftsResponse } from '../portals/vinnustund/types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface AppDependencies {
  shifts: Pick<ShiftRetrievalService, 'retrieveShifts'>;
  sessions: Pick<SessionManager, 'isAuthenticated'>;
  logger?: Logger;
}

export interface ErrorBody {
  success: false;
  error: ErrorKind | 'InternalError';
  message: string;
}

export interface AuthCheckBody {
  success: boolean;
  authenticated: boolean;
  message: string;
}

export interface RouteResult<T> {
  status: number;
  body: T;
}

export interface DateParams {
  dateFrom: unknown;
  dateTo: unknown;
}

// ============================================================================
// Route handlers
// ============================================================================

/**
 * Take dateFrom / dateTo from the query string, falling back to the body
 */
export function readDateParams(request: { query: unknown; body: unknown }): DateParams {
  return {
    dateFrom: pick(request.query, 'dateFrom') ?? pick(request.body, 'dateFrom'),
    dateTo: pick(request.query, 'dateTo') ?? pick(request.body, 'dateTo')
  };
}

export function errorResponse(error: unknown): RouteResult<ErrorBody> {
  if (isShiftServiceError(error)) {
    return {
      status: error.kind === 'InvalidParameters' ? 400 : 500,
      body: { success: false, error: error.kind, message: error.message }
    };
  }
  if (isClientError(error)) {
    return {
      status: 400,
      body: { success: false, error: 'InvalidParameters', message: getErrorMessage(error) }
    };
  }
  return {
    status: 500,
    body: { success: false, error: 'InternalError', message: getErrorMessage(error) }
  };
}

export async function retrieveShiftsRoute(
  shifts: AppDependencies['shifts'],
  params: DateParams
): Promise<RouteResult<ShiftsResponse | ErrorBody>> {
  try {
    return { status: 200, body: await shifts.retrieveShifts(params.dateFrom, params.dateTo) };
  } catch (error: unknown) {
    return errorResponse(error);
  }
}

export async function testAuthRoute(sessions: AppDependencies['sessions']): Promise<RouteResult<AuthCheckBody>> {
  const authenticated = await sessions.isAuthenticated();
  return {
    status: 200,
    body: {
      success: true,
      authenticated,
      message: authenticated ? 'Session is authenticated' : 'Session is not authenticated'
    }
  };
}

export function healthRoute(): RouteResult<{ status: 'healthy' }> {
  return { status: 200, body: { status: 'healthy' } };
}

// ============================================================================
// Express wiring
// ============================================================================

export function createApp(deps: AppDependencies): Express {
  const logger = deps.logger ?? createLogger('Server');
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(createShiftsRouter(deps, logger));

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    const result = errorResponse(error);
    if (result.status >= 500) {
      logger.error(`Unhandled error: ${result.body.message}`, error);
    }
    res.status(result.status).json(result.body);
  };
  app.use(handleError);

  return app;
}

function createShiftsRouter(deps: AppDependencies, logger: Logger): Router {
  const router = Router();

  const retrieve = async (req: Request, res: Response): Promise<void> => {
    const params = readDateParams(req);
    const result = await retrieveShiftsRoute(deps.shifts, params);
    if (result.status >= 500) {
      logger.error(`retrieve_shifts failed: ${'message' in result.body ? result.body.message : result.status}`);
    }
    res.status(result.status).json(result.body);
  };

  router.get('/retrieve_shifts', retrieve);
  router.post('/retrieve_shifts', retrieve);

  router.get('/test_auth', async (_req: Request, res: Response) => {
    const result = await testAuthRoute(deps.sessions);
    res.status(result.status).json(result.body);
  });

  router.get('/health', (_req: Request, res: Response) => {
    const result = healthRoute();
    res.status(result.status).json(result.body);
  });

  return router;
}

// ============================================================================
// Helpers
// ============================================================================

function pick(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return value === '' ? undefined : value;
}

/** body-parser and other middleware errors carry a 4xx `status` */
function isClientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return false;
  }
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500;
}
