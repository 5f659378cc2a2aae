/**
 * Unit tests for Result helpers
 */

import { describe, it, expect } from 'vitest';
import { tryAsync, errorCause, errorMessage } from '../../src/lib/result-types.js';

describe('result-types', () => {
  describe('tryAsync', () => {
    it('should wrap a resolved value', async () => {
      const result = await tryAsync(async () => 42, () => 'failed');

      expect(result._unsafeUnwrap()).toBe(42);
    });

    it('should map a rejection through the error handler', async () => {
      const result = await tryAsync(
        async (): Promise<number> => {
          throw new Error('connection reset');
        },
        (error) => `lookup: ${errorMessage(error)}`
      );

      expect(result._unsafeUnwrapErr()).toBe('lookup: connection reset');
    });
  });

  describe('errorMessage', () => {
    it('should use the message of an Error and stringify anything else', () => {
      expect(errorMessage(new TypeError('bad input'))).toBe('bad input');
      expect(errorMessage('timeout')).toBe('timeout');
      expect(errorMessage(503)).toBe('503');
    });
  });

  describe('errorCause', () => {
    it('should keep Errors and drop other thrown values', () => {
      const error = new Error('disk full');

      expect(errorCause(error)).toBe(error);
      expect(errorCause('disk full')).toBeUndefined();
    });
  });
});
