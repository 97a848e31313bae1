import { describe, expect, it } from 'vitest';
import { ApiError, getApiError, isApiError } from './apiError.js';
import { ServerError } from './serverError.js';
import { isValidationError } from './validationError.js';

const invalidKey = { message: 'Invalid API key', code: -1, status: 'error', name: 'Invalid_Key' };

describe('ApiError', () => {
  it('carries the body fields, kind and cause', () => {
    const cause = new ServerError(new Response(null, { status: 500 }));
    const err = new ApiError(invalidKey, 'structured', { cause });

    expect(err.message).toBe('Invalid API key');
    expect(err.code).toBe(-1);
    expect(err.status).toBe('error');
    expect(err.name).toBe('Invalid_Key');
    expect(err.kind).toBe('structured');
    expect(err.cause).toBe(cause);
  });

  it('prints the API name in its string form', () => {
    expect(String(new ApiError(invalidKey, 'structured'))).toBe('Invalid_Key: Invalid API key');
  });

  it('is not mistaken for a ValidationError when the API reports that name', () => {
    const err = new ApiError({ ...invalidKey, name: 'ValidationError' }, 'structured');

    expect(isValidationError(err)).toBe(false);
    expect(isApiError(err)).toBe(true);
  });
});

describe('getApiError', () => {
  it('unwraps nested causes', () => {
    const err = new ApiError(invalidKey, 'structured');
    expect(getApiError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns null for other errors', () => {
    expect(getApiError(new Error('boom'))).toBeNull();
  });
});
