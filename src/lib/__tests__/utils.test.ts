/**
 * Unit tests for src/lib/utils.ts
 */

import { parseErrorMessage, toError } from '../utils';

describe('parseErrorMessage', () => {
  test('should return string errors as-is', () => {
    expect(parseErrorMessage('connection lost')).toBe('connection lost');
  });

  test('should read the message of Error instances', () => {
    expect(parseErrorMessage(new Error('bad token'))).toBe('bad token');
  });

  test('should read a message property of plain objects', () => {
    expect(parseErrorMessage({ message: 'listener down' })).toBe('listener down');
  });

  test('should fall back to a generic message', () => {
    expect(parseErrorMessage(undefined)).toBe('An unexpected error occurred');
    expect(parseErrorMessage(42)).toBe('An unexpected error occurred');
  });
});

describe('toError', () => {
  test('should pass Error instances through', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
  });

  test('should wrap other values', () => {
    const error = toError('boom');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('boom');
  });
});
