/**
 * Career Prep AI Engine - Main Entry Point
 *
 * Routes interview, job-fit and aptitude operations between a local Ollama
 * model and Google Gemini, behind an HTTP API.
 */

import dotenv from 'dotenv';
import { Server } from 'http';
import { createLogger, transports, format, Logger } from 'winston';
import { createEngines } from './engines';
import { createEngineRouter, loadRouterPreferences, EngineRouter } from './router';
import { createApp } from './api';

dotenv.config();

// Create module logger
const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  defaultMeta: { service: 'main' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

const DEFAULT_PORT = 8000;

// Engine router instance (initialized on startup)
let engineRouter: EngineRouter | null = null;

// HTTP server instance (initialized on startup)
let server: Server | null = null;

function resolvePort(): number {
  const port = parseInt(process.env.PORT || String(DEFAULT_PORT), 10);
  if (Number.isNaN(port) || port <= 0) {
    logger.warn(`Ignoring PORT='${process.env.PORT}'; using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }
  return port;
}

/**
 * Initializes the engines, router and HTTP server
 */
async function initialize(): Promise<void> {
  logger.info('Career Prep AI Engine starting...', {
    environment: process.env.NODE_ENV || 'development',
  });

  const { preferences, warnings } = loadRouterPreferences();
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const router = createEngineRouter(createEngines(), preferences);
  engineRouter = router;

  // Check once so the first requests skip engines that are already down
  const health = await router.refreshHealth();
  logger.info('Initial engine health', {
    local: health.local.available,
    cloud: health.cloud.available,
  });

  const port = resolvePort();
  const app = createApp({ router });
  server = app.listen(port, () => {
    logger.info(`HTTP API listening on port ${port}`);
  });
}

/**
 * Graceful shutdown handler
 */
function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down...`);

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: error.message });
      process.exit(1);
    }
    logger.info('Shutdown complete');
    process.exit(0);
  });
}

// Handle graceful shutdown signals
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

// Initialize on startup
initialize().catch((error: unknown) => {
  logger.error('Failed to initialize', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});

// Export for external access
export { engineRouter, server };
