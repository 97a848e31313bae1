import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

describe('validator', () => {
  it('returns the parsed value for a valid zod schema', async () => {
    const schema = z.object({ username: z.string(), reputation: z.number() });
    const [err, parsed] = await validator({ username: 'test-user', reputation: 42, extra: true }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ username: 'test-user', reputation: 42 });
  });

  it('returns a ValidationError carrying the issues', async () => {
    const schema = z.object({ code: z.number() });
    const [err, parsed] = await validator({ code: 'nope' }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0].path).toEqual(['code']);
  });

  it('awaits async schemas', async () => {
    const schema = z.string().refine(async (value) => value.length > 2);

    const [errShort] = await validator('ab', schema);
    const [errLong, value] = await validator('abc', schema);

    expect(errShort).toBeInstanceOf(ValidationError);
    expect(errLong).toBeNull();
    expect(value).toBe('abc');
  });

  it('returns error when async validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: async () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating async data');
    expect((err?.cause as Error).message).toBe('oops');
  });

  it('returns error when sync validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
    expect((err?.cause as Error).message).toBe('oops');
  });
});
