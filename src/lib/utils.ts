/**
 * Check if debug logging is enabled (NODE_ENV=development or TRANSCRIPT_ROUTER_DEBUG=true)
 * Cached for performance - computed once per module load
 */
let _isDebugCached: boolean | null = null;
export function isDebugLoggingEnabled(): boolean {
  if (_isDebugCached !== null) return _isDebugCached;

  _isDebugCached = process.env.NODE_ENV === 'development' ||
                   process.env.TRANSCRIPT_ROUTER_DEBUG === 'true';
  return _isDebugCached;
}

/**
 * Development-only logging functions
 * These only log when debug logging is enabled (see isDebugLoggingEnabled)
 * Use these instead of console.log/warn/error for per-token logs that should not appear in production
 */
export function devLog(...args: unknown[]): void {
  if (isDebugLoggingEnabled()) {
    console.log(...args);
  }
}

export function devWarn(...args: unknown[]): void {
  if (isDebugLoggingEnabled()) {
    console.warn(...args);
  }
}

export function devError(...args: unknown[]): void {
  if (isDebugLoggingEnabled()) {
    console.error(...args);
  }
}

/**
 * Parse error messages for log output
 */
export function parseErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return 'An unexpected error occurred';
}

/**
 * Normalize an unknown thrown value into an Error instance (for Sentry)
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(parseErrorMessage(error));
}
