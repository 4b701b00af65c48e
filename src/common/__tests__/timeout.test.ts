/**
 * Jest Unit Tests for Timeout Helpers
 */

import { CapabilityTimeoutError, errorMessage, withTimeout } from '../utils/timeout.js';

describe('Timeout Helpers', () => {
  test('resolves with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'fast')).resolves.toBe(7);
  });

  test('propagates the wrapped rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'failing')).rejects.toThrow('boom');
  });

  test('rejects with CapabilityTimeoutError when the budget runs out', async () => {
    const never = new Promise<number>(() => undefined);
    const result = withTimeout(never, 10, 'slow');
    await expect(result).rejects.toBeInstanceOf(CapabilityTimeoutError);
    await expect(result).rejects.toThrow('slow timed out after 10ms');
  });

  test('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage('plain')).toBe('plain');
  });
});
