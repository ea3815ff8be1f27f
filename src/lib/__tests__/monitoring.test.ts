/**
 * Unit tests for src/lib/monitoring.ts
 * @jest-environment node
 */

import * as Sentry from '@sentry/node';
import { initMonitoring } from '../monitoring';

jest.mock('@sentry/node', () => ({
  init: jest.fn(),
}));

jest.mock('../utils', () => ({
  devLog: jest.fn(),
}));

describe('initMonitoring', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should stay disabled without a DSN', () => {
    expect(initMonitoring({})).toBe(false);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it('should initialise Sentry with production sampling', () => {
    expect(initMonitoring({ SENTRY_DSN: 'https://public@example.invalid/1', NODE_ENV: 'production' })).toBe(true);

    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: 'https://public@example.invalid/1',
        tracesSampleRate: 0.1,
        debug: false,
        environment: 'production',
      })
    );
  });

  it('should drop deprecation warnings before sending', () => {
    initMonitoring({ SENTRY_DSN: 'https://public@example.invalid/1', NODE_ENV: 'development' });

    const options = jest.mocked(Sentry.init).mock.calls[0][0];
    expect(options?.tracesSampleRate).toBe(1.0);
    expect(options?.debug).toBe(true);

    const noise = { type: undefined, message: 'DeprecationWarning: Buffer() is deprecated' };
    const real = { type: undefined, message: 'Upstream transcription error 503' };
    expect(options?.beforeSend?.(noise, {})).toBeNull();
    expect(options?.beforeSend?.(real, {})).toBe(real);
  });
});
