/**
 * Tests for Error Utilities
 */

import { extractErrorMessage, truncateErrorMessage } from '../logic/utils/errorUtils';

describe('Error Utilities', () => {
  describe('extractErrorMessage', () => {
    test('extracts message from Error instance', () => {
      expect(extractErrorMessage(new Error('socket hang up'))).toBe('socket hang up');
    });

    test('extracts message from Error subclasses', () => {
      expect(extractErrorMessage(new TypeError('fetch failed'))).toBe('fetch failed');
    });

    test('converts non-errors to string', () => {
      expect(extractErrorMessage('timeout')).toBe('timeout');
      expect(extractErrorMessage(503)).toBe('503');
      expect(extractErrorMessage(null)).toBe('null');
      expect(extractErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('truncateErrorMessage', () => {
    test('keeps short messages', () => {
      expect(truncateErrorMessage('Bad Gateway')).toBe('Bad Gateway');
    });

    test('truncates to 200 characters by default', () => {
      expect(truncateErrorMessage('x'.repeat(250))).toBe('x'.repeat(200));
    });

    test('honours a custom maximum', () => {
      expect(truncateErrorMessage('Service Unavailable', 7)).toBe('Service');
    });
  });
});
