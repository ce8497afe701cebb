import {
  addDays,
  eachDayOfInterval,
  format,
  isValid,
  isWeekend,
  parseISO,
  subDays,
} from 'date-fns';
import type { IsoDate } from '../types';
import { ValidationError } from './errors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

export function toDate(value: IsoDate): Date {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid calendar date: ${value}`, 'date');
  }
  return parseISO(value);
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function addDaysIso(value: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(toDate(value), days));
}

export function subDaysIso(value: IsoDate, days: number): IsoDate {
  return toIsoDate(subDays(toDate(value), days));
}

// ISO dates compare lexically
export function maxIsoDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

/** Weekdays in [from, to]; the closest approximation of trading days without an exchange calendar. */
export function weekdaysBetween(from: IsoDate, to: IsoDate): IsoDate[] {
  if (from > to) return [];
  return eachDayOfInterval({ start: toDate(from), end: toDate(to) })
    .filter((d) => !isWeekend(d))
    .map(toIsoDate);
}

/** Current calendar date in the given IANA zone. */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

/** YYYYMMDD, the form KRX and DART expect. */
export function toCompactDate(value: IsoDate): string {
  return value.replace(/-/g, '');
}

export function fromCompactDate(value: string): IsoDate {
  const digits = value.replace(/[^0-9]/g, '');
  if (digits.length !== 8) {
    throw new ValidationError(`Invalid compact date: ${value}`, 'date');
  }
  return `${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`;
}
