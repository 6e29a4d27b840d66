import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigError, NotFoundError, StoreError } from '../errors.js';

describe('NotFoundError', () => {
  it('names the resource and ID', () => {
    const error = new NotFoundError('Ship type', 9001);

    expect(error).toBeInstanceOf(StoreError);
    expect(error.message).toBe("Ship type '9001' not found");
    expect(error.code).toBe('NOT_FOUND');
  });

  it('omits the ID when none is given', () => {
    expect(new NotFoundError('Organization').message).toBe('Organization not found');
  });
});

describe('ConfigError.fromZod', () => {
  it('joins every issue with its path', () => {
    const schema = z.object({ host: z.string(), port: z.number() });
    const result = schema.safeParse({ host: 1, port: 3306 });
    if (result.success) throw new Error('expected parse failure');

    const error = ConfigError.fromZod(result.error);

    expect(error.message).toBe('Invalid configuration: host: Expected string, received number');
    expect(error.details).toEqual({ issues: [{ path: 'host', message: 'Expected string, received number' }] });
  });
});
