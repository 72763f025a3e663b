import { describe, it, expect } from 'vitest';
import { isDatabaseConnectionError } from '@prepscout/db';

describe('isDatabaseConnectionError', () => {
  it('recognizes auth and connection failures', () => {
    expect(isDatabaseConnectionError({ code: '28P01' })).toBe(true);
    expect(isDatabaseConnectionError({ code: 'ENOTFOUND' })).toBe(true);
    expect(isDatabaseConnectionError(new Error('connect ECONNREFUSED 127.0.0.1:5432'))).toBe(true);
  });

  it('ignores other errors and non-objects', () => {
    expect(isDatabaseConnectionError({ code: '23505', message: 'duplicate key value' })).toBe(false);
    expect(isDatabaseConnectionError('x')).toBe(false);
    expect(isDatabaseConnectionError(null)).toBe(false);
  });
});
