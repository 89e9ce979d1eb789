/**
 * Shift API server
 *
 * Usage:
 *   npm start
 */

import { ConfigError, loadConfig, loadEnv, toSessionManagerConfig, type AppConfig } from '../config/index.js';
import { SessionManager } from '../portals/vinnustund/auth/session-manager.js';
import { createShiftRetrievalService } from '../portals/vinnustund/client.js';
import { createLogger } from '../shared/utils/logger.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { createApp } from './app.js';

function readConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  loadEnv();
  const config = readConfigOrExit();

  const logger = createLogger('Server', { level: config.logLevel ?? 'info' });
  const sessions = new SessionManager(toSessionManagerConfig(config));
  const shifts = createShiftRetrievalService(sessions, {
    requestDelay: config.requestDelay,
    logLevel: config.logLevel
  });

  const app = createApp({ shifts, sessions, logger });
  const server = app.listen(config.port, () => {
    logger.info(`🚀 Listening on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    sessions.close();
    server.close(error => {
      if (error) {
        logger.error(`Error while closing server: ${getErrorMessage(error)}`, error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
