import { DateParseError } from '../errors.js';
import type { Outcome } from '../types.js';

/**
 * Accepted timestamp layouts: EXIF style `YYYY:MM:DD HH:MM:SS`
 * and ISO-like `YYYY-MM-DD HH:MM:SS`.
 */
const LAYOUTS = [
  /^(\d{4}):(\d{1,2}):(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
  /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse a capture timestamp into an 8-digit `YYYYMMDD` token
 */
export function parseDateToken(input: string): Outcome<string, DateParseError> {
  for (const layout of LAYOUTS) {
    const match = layout.exec(input);
    if (!match) continue;

    const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] = match.slice(1).map(Number);
    const valid =
      year >= 1 &&
      month >= 1 && month <= 12 &&
      day >= 1 && day <= daysInMonth(year, month) &&
      hour <= 23 && minute <= 59 && second <= 59;
    if (!valid) break;

    const pad = (n: number, width: number) => String(n).padStart(width, '0');
    return { ok: true, value: `${pad(year, 4)}${pad(month, 2)}${pad(day, 2)}` };
  }
  return { ok: false, error: new DateParseError(input) };
}

/**
 * `YYYYMMDD`, or an empty string when the timestamp is missing or unparseable
 */
export function dateToken(input: string | undefined): string {
  if (input === undefined || input.length === 0) return '';
  const outcome = parseDateToken(input);
  return outcome.ok ? outcome.value : '';
}
