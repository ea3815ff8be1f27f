import * as Sentry from '@sentry/node';
import { devLog } from './utils';

/**
 * Initialise Sentry error reporting for the process hosting the router.
 *
 * Returns false (and leaves Sentry uninitialised) when no DSN is configured;
 * the capture calls made by the router are then no-ops.
 */
export function initMonitoring(env: NodeJS.ProcessEnv = process.env): boolean {
  const dsn = env.SENTRY_DSN;
  if (!dsn) {
    devLog('[TranscriptRouter] SENTRY_DSN not set - error reporting disabled');
    return false;
  }

  Sentry.init({
    dsn,

    // Performance Monitoring
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,

    // Debug mode in development
    debug: env.NODE_ENV === 'development',

    // Environment tag
    environment: env.NODE_ENV,

    // Before sending - filter out noise
    beforeSend(event) {
      // Filter out Node.js deprecation warnings from dependencies
      const message = event.message || event.exception?.values?.[0]?.value || '';
      if (message.includes('DeprecationWarning')) {
        return null;
      }
      return event;
    },
  });

  return true;
}
