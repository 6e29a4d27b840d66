import { describe, it, expect } from 'vitest';
import { createLogger, logger } from '../logger.js';

describe('createLogger', () => {
  it('binds the component to a child of the root logger', () => {
    const log = createLogger('db');

    expect(log.bindings()).toMatchObject({ name: 'killfeed', component: 'db' });
    expect(log.level).toBe(logger.level);
  });
});
