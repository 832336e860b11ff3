import { InvalidDurationError } from '../domain/errors/DomainErrors.js';

export const DEFAULT_RETENTION_DAYS = 30;
export const HOURS_PER_DAY = 24;
export const DAYS_PER_WEEK = 7;
export const DAYS_PER_MONTH = 30;

const DURATION_PATTERN = /^(-?\d+)\s*([A-Za-z]+)$/;

/**
 * 解析保留期限字串為天數
 *
 * 支援 `h`（無條件進位為整天）、`d`、`w`（×7）、`m`（×30）。
 * 空字串回傳 DEFAULT_RETENTION_DAYS；不檢查負值，由呼叫端決定。
 */
export function parseRetentionDays(input: string): number {
  const trimmed = input.trim();
  if (trimmed === '') return DEFAULT_RETENTION_DAYS;

  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) {
    throw new InvalidDurationError('INVALID_DURATION', input);
  }

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 'h':
      return Math.ceil(value / HOURS_PER_DAY);
    case 'd':
      return value;
    case 'w':
      return value * DAYS_PER_WEEK;
    case 'm':
      return value * DAYS_PER_MONTH;
    default:
      throw new InvalidDurationError('UNSUPPORTED_DURATION_UNIT', input);
  }
}
