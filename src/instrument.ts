import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

import type { Config } from './config/index.js';

// Only initialize if DSN is provided
// This allows running without Sentry in development
export function initSentry(options: Config['sentry'], logger: FastifyBaseLogger): void {
  if (!options) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: options.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: options.environment }, 'Sentry initialized');
}

// Re-export Sentry for use in error handler
export { Sentry };
