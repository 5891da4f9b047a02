/**
 * UTC date formatting for `datetime_now` values and validity periods.
 *
 * Accepts both token styles found in configurations: `YYYYMMDD` and
 * `%Y%m%d`.
 */

export const DEFAULT_DATE_FORMAT = 'YYYYMMDD';

const TOKEN_RE = /YYYY|SSS|MM|DD|HH|mm|ss/g;
const STRFTIME_RE = /%[YmdHMSfjyb%]/g;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

function tokenValue(token: string, date: Date): string {
  switch (token) {
    case 'YYYY':
    case '%Y':
      return pad(date.getUTCFullYear(), 4);
    case '%y':
      return pad(date.getUTCFullYear() % 100);
    case 'MM':
    case '%m':
      return pad(date.getUTCMonth() + 1);
    case 'DD':
    case '%d':
      return pad(date.getUTCDate());
    case 'HH':
    case '%H':
      return pad(date.getUTCHours());
    case 'mm':
    case '%M':
      return pad(date.getUTCMinutes());
    case 'ss':
    case '%S':
      return pad(date.getUTCSeconds());
    case 'SSS':
      return pad(date.getUTCMilliseconds(), 3);
    case '%f':
      return pad(date.getUTCMilliseconds() * 1000, 6);
    case '%j': {
      const start = Date.UTC(date.getUTCFullYear(), 0, 1);
      return pad(Math.floor((date.getTime() - start) / 86_400_000) + 1, 3);
    }
    case '%b':
      return date.toLocaleString('en-US', { month: 'short', timeZone: 'UTC' });
    case '%%':
      return '%';
    default:
      return token;
  }
}

export function formatDate(date: Date, pattern: string = DEFAULT_DATE_FORMAT): string {
  const re = pattern.includes('%') ? STRFTIME_RE : TOKEN_RE;
  return pattern.replace(re, (token) => tokenValue(token, date));
}

/**
 * Parses an ISO-8601 timestamp (`2024-01-01T00:00:00Z`). Returns undefined
 * for anything Date cannot read.
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
