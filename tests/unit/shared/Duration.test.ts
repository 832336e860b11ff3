import { describe, it, expect } from 'vitest';
import { parseRetentionDays, DEFAULT_RETENTION_DAYS } from '../../../src/shared/Duration.js';
import { InvalidDurationError } from '../../../src/domain/errors/DomainErrors.js';

describe('parseRetentionDays', () => {
  it.each([
    ['30d', 30],
    ['0d', 0],
    ['2w', 14],
    ['1m', 30],
    ['24h', 1],
    ['25h', 2],
    ['1h', 1],
    [' 7d ', 7],
    ['-5d', -5],
  ])('parses %j as %i days', (input, expected) => {
    expect(parseRetentionDays(input)).toBe(expected);
  });

  it('returns the default for an empty string', () => {
    expect(parseRetentionDays('')).toBe(DEFAULT_RETENTION_DAYS);
    expect(parseRetentionDays('   ')).toBe(30);
  });

  it.each(['abc', '30', 'd', '1.5d'])('rejects malformed input %j', (input) => {
    try {
      parseRetentionDays(input);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidDurationError);
      expect(err).toMatchObject({ code: 'INVALID_DURATION', input });
    }
  });

  it('rejects an unknown unit', () => {
    expect(() => parseRetentionDays('5y')).toThrow('Unsupported duration unit in "5y"');
    expect(() => parseRetentionDays('5D')).toThrow(InvalidDurationError);
  });
});
