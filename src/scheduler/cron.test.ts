import { describe, expect, it } from 'vitest';
import { ConfigInvalid } from '../errors';
import { parseCron } from './cron';

describe('parseCron', () => {
  it.each([
    '0 */6 * * *',
    '*/15 9-17 * JAN-MAR MON-FRI',
    '30 2 1,15 * *',
    '0 12 * * 1-5',
  ])('accepts "%s"', (expr) => {
    expect(parseCron(expr).expression).toBe(expr);
  });

  it('normalizes whitespace', () => {
    expect(parseCron('  0   0 * * * ').expression).toBe('0 0 * * *');
  });

  it.each([
    '',
    '* * * *',
    '* * * * * *',
    '60 * * * *',
    '* 24 * * *',
    '* * * 13 *',
    'a * * * *',
  ])('rejects "%s"', (expr) => {
    expect(() => parseCron(expr)).toThrow(ConfigInvalid);
  });
});
