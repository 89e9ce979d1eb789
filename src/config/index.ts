/**
 * Runtime configuration
 *
 * Read from the environment, with `.env` and `.env.local` loaded by dotenv.
 */

import dotenv from 'dotenv';
import { isLogLevel, type LogLevel } from '../shared/utils/logger.js';
import type { DelayRange } from '../shared/utils/helpers.js';
import type { SessionManagerConfig } from '../portals/vinnustund/auth/session-manager.js';
import { VINNUSTUND_DEFAULT_BASE_URL, type VinnustundCredentials } from '../portals/vinnustund/types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface AppConfig {
  credentials: VinnustundCredentials;
  baseUrl: string;
  refreshAutomatically: boolean;
  automaticRefreshPeriodHours: number;
  keepAliveEnabled: boolean;
  keepAliveIntervalMinutes: number;
  requestTimeoutMs: number;
  requestDelay: DelayRange;
  port: number;
  logLevel?: LogLevel;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: '.env.local' });
}

/**
 * Build the configuration from environment variables. Throws ConfigError
 * when credentials are missing or a value does not parse.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = ['VINNUSTUND_USERNAME', 'VINNUSTUND_PASSWORD'].filter(key => !env[key]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required env vars: ${missing.join(', ')}`, missing);
  }

  const logLevel = env.LOG_LEVEL?.toLowerCase();
  if (logLevel !== undefined && logLevel !== '' && !isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}"`);
  }

  const requestDelay: DelayRange = {
    minMs: readNumber(env, 'REQUEST_DELAY_MIN_MS', 1000),
    maxMs: readNumber(env, 'REQUEST_DELAY_MAX_MS', 2000)
  };
  if (requestDelay.maxMs < requestDelay.minMs) {
    throw new ConfigError('REQUEST_DELAY_MAX_MS must not be below REQUEST_DELAY_MIN_MS');
  }

  return {
    credentials: {
      username: env.VINNUSTUND_USERNAME ?? '',
      password: env.VINNUSTUND_PASSWORD ?? ''
    },
    baseUrl: env.VINNUSTUND_BASE_URL || VINNUSTUND_DEFAULT_BASE_URL,
    refreshAutomatically: readBoolean(env, 'REFRESH_AUTOMATICALLY', false),
    automaticRefreshPeriodHours: readPositive(env, 'AUTOMATIC_REFRESH_PERIOD_HOURS', 4),
    keepAliveEnabled: readBoolean(env, 'KEEP_ALIVE_ENABLED', false),
    keepAliveIntervalMinutes: readPositive(env, 'KEEP_ALIVE_INTERVAL_MINUTES', 10),
    requestTimeoutMs: readPositive(env, 'REQUEST_TIMEOUT_MS', 30000),
    requestDelay,
    port: readPositive(env, 'PORT', 5000),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : undefined
  };
}

/**
 * SessionManager settings for this configuration
 */
export function toSessionManagerConfig(config: AppConfig): SessionManagerConfig {
  return {
    credentials: config.credentials,
    baseUrl: config.baseUrl,
    timeout: config.requestTimeoutMs,
    refreshAutomatically: config.refreshAutomatically,
    automaticRefreshPeriodMs: config.automaticRefreshPeriodHours * 60 * 60 * 1000,
    keepAlive: config.keepAliveEnabled,
    keepAliveIntervalMs: config.keepAliveIntervalMinutes * 60 * 1000,
    logLevel: config.logLevel
  };
}

// ============================================================================
// Parsing helpers
// ============================================================================

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`Invalid boolean for ${key}: "${env[key]}"`);
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Invalid number for ${key}: "${raw}"`);
  }
  return value;
}

function readPositive(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (value === 0) {
    throw new ConfigError(`${key} must be greater than 0`);
  }
  return value;
}
