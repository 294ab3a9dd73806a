import { describe, it, expect } from 'vitest';
import { isUniqueViolation } from '../../src/db/pg-store';

describe('isUniqueViolation', () => {
  it('matches a raw unique_violation', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
  });

  it('matches one wrapped in a cause chain', () => {
    const wrapped = new Error('insert failed', { cause: { code: '23505' } });
    expect(isUniqueViolation(wrapped)).toBe(true);
    expect(isUniqueViolation(new Error('outer', { cause: wrapped }))).toBe(true);
  });

  it('ignores other database errors', () => {
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
    expect(isUniqueViolation(new Error('deadlock', { cause: { code: '40P01' } }))).toBe(false);
  });

  it('ignores values that are not errors', () => {
    expect(isUniqueViolation(undefined)).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
    expect(isUniqueViolation(new Error('plain'))).toBe(false);
  });
});
