import { describe, expect, it } from 'vitest';
import { formatError } from './errors';
import { maskToken } from './logger';

describe('maskToken', () => {
  it('keeps only the edges of a secret', () => {
    expect(maskToken('abcdefgh')).toBe('****efgh');
    expect(maskToken('0123456789abcdefXYZ')).toBe('01234567***bcdefXYZ');
    expect(maskToken('')).toBe('');
  });
});

describe('formatError', () => {
  it('drops trailing punctuation and accepts non-errors', () => {
    expect(formatError(new Error('Fetch failed.'))).toBe('Fetch failed');
    expect(formatError({ message: 'plain object!' })).toBe('plain object');
    expect(formatError(42)).toBe('42');
  });
});
