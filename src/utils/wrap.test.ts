import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync } from './wrap.js';

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    expect(safeWrap(() => JSON.stringify({ key: 'test-key' }))).toEqual([null, '{"key":"test-key"}']);
  });

  it('returns [error, null] when the function throws', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const [err, data] = safeWrap(() => JSON.stringify(circular));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(TypeError);
  });

  it('keeps thrown non-error values as they are', () => {
    const [err] = safeWrap<string>(() => {
      throw 'plain string';
    });

    expect(err).toBe('plain string');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    expect(await safeWrapAsync(() => Promise.resolve('ok'))).toEqual([null, 'ok']);
  });

  it('returns [error, null] when the promise rejects', async () => {
    const rejection = new Error('async boom');

    expect(await safeWrapAsync(() => Promise.reject(rejection))).toEqual([rejection, null]);
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('captures JSON.parse errors inside async function', async () => {
    const [err, data] = await safeWrapAsync<Error, unknown>(async () => {
      await Promise.resolve();
      return JSON.parse('{ value: 123 ');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});
