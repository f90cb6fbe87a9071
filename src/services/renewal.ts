import { ConfigurationError, MalformedTimestampError, MissingFieldError } from '../errors.js';
import type { CertificateRecord } from './x509.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// openssl prints e.g. "Mar 18 05:36:21 2025 GMT" or "Mar  8 05:36:21 2025 GMT".
const TIMESTAMP = /^([A-Z][a-z]{2}) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4}) GMT$/;

export interface RenewalDecision {
  notBefore: Date;
  notAfter: Date;
  nextRenewal: Date;
}

export function parseCertificateTime(text: string): Date {
  if (!text.endsWith(' GMT')) {
    throw new MalformedTimestampError(text, 'expected a " GMT" suffix');
  }
  const match = TIMESTAMP.exec(text);
  if (!match) {
    throw new MalformedTimestampError(text, 'expected "<Mon> <DD> <HH>:<MM>:<SS> <YYYY> GMT"');
  }
  const [, monthName, day, hour, minute, second, year] = match;
  const month = MONTHS.indexOf(monthName);
  if (month === -1) {
    throw new MalformedTimestampError(text, `unknown month "${monthName}"`);
  }
  const y = Number(year);
  const d = Number(day);
  const h = Number(hour);
  const m = Number(minute);
  const s = Number(second);
  const date = new Date(Date.UTC(y, month, d, h, m, s));
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== m ||
    date.getUTCSeconds() !== s
  ) {
    throw new MalformedTimestampError(text, 'not a valid calendar time');
  }
  return date;
}

export function computeRenewal(record: CertificateRecord, leadDays: number): RenewalDecision {
  if (record.notBefore === undefined) throw new MissingFieldError('notBefore');
  if (record.notAfter === undefined) throw new MissingFieldError('notAfter');
  const notBefore = parseCertificateTime(record.notBefore);
  const notAfter = parseCertificateTime(record.notAfter);
  return {
    notBefore,
    notAfter,
    nextRenewal: new Date(notAfter.getTime() - leadDays * DAY_MS),
  };
}

export function assertTimeZone(timeZone: string): string {
  try {
    return new Intl.DateTimeFormat('en-US', { timeZone }).resolvedOptions().timeZone;
  } catch (err) {
    if (err instanceof RangeError) throw new ConfigurationError(`unknown time zone "${timeZone}"`);
    throw err;
  }
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** ISO 8601 with the zone's UTC offset, e.g. 2025-02-16T14:36:21+09:00. */
export function formatInstant(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find(p => p.type === type)?.value ?? 0);

  const year = part('year');
  const month = part('month');
  const day = part('day');
  const hour = part('hour');
  const minute = part('minute');
  const second = part('second');

  const wall = Date.UTC(year, month - 1, day, hour, minute, second);
  const offsetMinutes = Math.round((wall - Math.floor(date.getTime() / 1000) * 1000) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}
