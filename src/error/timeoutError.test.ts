import { describe, expect, it } from 'vitest';
import { isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('formats the message and exposes the timeout', () => {
    const err = new TimeoutError(250);

    expect(err.message).toBe('error request timed out after 250ms');
    expect(err.timeout).toBe(250);
  });
});

describe('isTimeoutError', () => {
  it('returns true for instances of TimeoutError', () => {
    expect(isTimeoutError(new TimeoutError(10))).toBe(true);
  });

  it('returns true for a TimeoutError nested as cause', () => {
    const wrapped = new Error('error wrapping POST request in fetchClient', { cause: new TimeoutError(10) });
    expect(isTimeoutError(wrapped)).toBe(true);
  });

  it('returns false for non TimeoutError errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});
