import type { DateRange, FiscalYearResolution, IsoDate, RangeResolution } from '../types';
import { addDaysIso, maxIsoDate, subDaysIso } from '../utils';

export const DEFAULT_WINDOW_DAYS = 365;

/** `max(today - windowDays, earliest) .. today`. */
export function resolveFullWindow(
  providerEarliest: IsoDate | null,
  today: IsoDate,
  windowDays: number = DEFAULT_WINDOW_DAYS
): DateRange {
  const windowStart = subDaysIso(today, windowDays);
  const from = providerEarliest ? maxIsoDate(windowStart, providerEarliest) : windowStart;
  return { from, to: today };
}

/**
 * Range still missing for one ticker and entity. With a last stored date D
 * the range is D+1 .. today; with none it is the full default window.
 */
export function resolveRange(
  lastDate: IsoDate | null,
  providerEarliest: IsoDate | null,
  today: IsoDate,
  windowDays: number = DEFAULT_WINDOW_DAYS
): RangeResolution {
  if (lastDate === null) {
    return { kind: 'range', range: resolveFullWindow(providerEarliest, today, windowDays) };
  }

  const from = addDaysIso(lastDate, 1);
  if (from > today) {
    return { kind: 'already_current', lastDate };
  }
  return { kind: 'range', range: { from, to: today } };
}

/** Fiscal years still missing: lastYear+1 .. endYear, or startYear .. endYear. */
export function resolveFiscalYears(lastYear: number | null, startYear: number, endYear: number): FiscalYearResolution {
  const first = lastYear === null ? startYear : Math.max(lastYear + 1, startYear);
  if (lastYear !== null && first > endYear) {
    return { kind: 'already_current', lastYear };
  }

  const years: number[] = [];
  for (let year = first; year <= endYear; year++) {
    years.push(year);
  }
  return { kind: 'years', years };
}
