/**
 * Date Resolver
 *
 * Turns the date phrase of a question into an inclusive DateScope:
 * - "2026-01-05", "between 2026-01-01 and 2026-01-07" (ISO)
 * - "January 10", "Jan 10th, 2025" (month + day)
 * - "January 2026" (whole month)
 * - "today", "yesterday"
 * - "last 30 days", "past 2 weeks", "last 3 months"
 * - "last week", "this week", "this month", "last month", "this year"
 * - "last Tuesday", "on Friday"
 *
 * Matchers are tried in order; the first one that resolves wins.
 * Relative phrases are anchored on the reference date passed in, so the
 * result is deterministic for a given (text, referenceDate).
 */

import type { DateScope } from '../../common/types.js';
import {
  addDays,
  dayOfWeek,
  endOfMonth,
  isIsoDate,
  parseIsoDate,
  startOfMonth,
  toIsoDate,
} from '../../common/utils/dates.js';

// =============================================================================
// CONSTANTS
// =============================================================================

const MONTHS: Record<string, number> = {
  january: 0, jan: 0,
  february: 1, feb: 1,
  march: 2, mar: 2,
  april: 3, apr: 3,
  may: 4,
  june: 5, jun: 5,
  july: 6, jul: 6,
  august: 7, aug: 7,
  september: 8, sept: 8, sep: 8,
  october: 9, oct: 9,
  november: 10, nov: 10,
  december: 11, dec: 11,
};

const WEEKDAYS: Record<string, number> = {
  sunday: 0, monday: 1, tuesday: 2, wednesday: 3, thursday: 4, friday: 5, saturday: 6,
};

const MONTH_ALTERNATION = Object.keys(MONTHS).sort((a, b) => b.length - a.length).join('|');
const WEEKDAY_ALTERNATION = Object.keys(WEEKDAYS).join('|');

const ISO_PATTERN = /\b(\d{4}-\d{2}-\d{2})\b/g;
const MONTH_DAY_PATTERN = new RegExp(
  `\\b(${MONTH_ALTERNATION})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s+(\\d{4}))?\\b`,
  'i'
);
const MONTH_DAY_GLOBAL = new RegExp(MONTH_DAY_PATTERN.source, 'gi');
const MONTH_YEAR_PATTERN = new RegExp(`\\b(${MONTH_ALTERNATION})\\s+(\\d{4})\\b`, 'i');
const LAST_N_PATTERN = /\b(?:last|past|previous)\s+(\d{1,3})\s+(day|week|month)s?\b/i;
const WEEKDAY_PATTERN = new RegExp(`\\b(?:last|on|this past)\\s+(${WEEKDAY_ALTERNATION})\\b`, 'i');

// =============================================================================
// HELPERS
// =============================================================================

function single(date: string, phrase: string): DateScope {
  return { kind: 'single', start: date, end: date, phrase, defaulted: false };
}

function range(start: string, end: string, phrase: string): DateScope {
  if (start === end) return single(start, phrase);
  return start <= end
    ? { kind: 'range', start, end, phrase, defaulted: false }
    : { kind: 'range', start: end, end: start, phrase, defaulted: false };
}

function monthIndex(name: string): number | undefined {
  return MONTHS[name.toLowerCase()];
}

function isoFromParts(year: number, month: number, day: number): string | null {
  const iso = toIsoDate(new Date(Date.UTC(year, month, day)));
  const expected = `${String(year).padStart(4, '0')}-${String(month + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  return iso === expected ? iso : null;
}

// =============================================================================
// PATTERN MATCHERS
// =============================================================================

type DateMatcher = (text: string, today: string) => DateScope | null;

/**
 * One ISO date is a single day, two are a range
 */
const matchIso: DateMatcher = (text) => {
  const found = Array.from(text.matchAll(ISO_PATTERN), m => m[1]).filter(isIsoDate);
  if (found.length === 0) return null;
  if (found.length === 1) return single(found[0], found[0]);
  return range(found[0], found[1], `${found[0]} - ${found[1]}`);
};

/**
 * Month name and day to an ISO date. Without a year, the most recent
 * occurrence not after the reference date.
 */
function resolveMonthDay(monthName: string, dayText: string, yearText: string | undefined, today: string): string | null {
  const month = monthIndex(monthName);
  if (month === undefined) return null;
  const day = parseInt(dayText, 10);
  if (yearText) return isoFromParts(parseInt(yearText, 10), month, day);

  const refYear = parseIsoDate(today).getUTCFullYear();
  const thisYear = isoFromParts(refYear, month, day);
  if (thisYear && thisYear <= today) return thisYear;
  return isoFromParts(refYear - 1, month, day);
}

/**
 * "January 10", "Jan 10th, 2025"
 */
const matchMonthDay: DateMatcher = (text, today) => {
  const m = MONTH_DAY_PATTERN.exec(text);
  if (!m) return null;
  const date = resolveMonthDay(m[1], m[2], m[3], today);
  return date ? single(date, m[0]) : null;
};

/**
 * "January 2026" covers the whole month
 */
const matchMonthYear: DateMatcher = (text) => {
  const m = MONTH_YEAR_PATTERN.exec(text);
  if (!m) return null;
  const month = monthIndex(m[1]);
  if (month === undefined) return null;
  const year = parseInt(m[2], 10);
  const start = isoFromParts(year, month, 1);
  return start ? range(start, endOfMonth(year, month), m[0]) : null;
};

const matchTodayYesterday: DateMatcher = (text, today) => {
  if (/\byesterday\b/i.test(text)) return single(addDays(today, -1), 'yesterday');
  if (/\b(today|this morning|tonight)\b/i.test(text)) return single(today, 'today');
  return null;
};

/**
 * "last N days|weeks|months" ends on the reference date
 */
const matchLastN: DateMatcher = (text, today) => {
  const m = LAST_N_PATTERN.exec(text);
  if (!m) return null;
  const n = parseInt(m[1], 10);
  if (n <= 0) return null;
  const unit = m[2].toLowerCase();
  const days = unit === 'day' ? n : unit === 'week' ? n * 7 : n * 30;
  return range(addDays(today, -(days - 1)), today, m[0]);
};

const matchNamedPeriod: DateMatcher = (text, today) => {
  const lower = text.toLowerCase();

  if (/\b(last|past|previous) week\b/.test(lower)) {
    return range(addDays(today, -6), today, 'last week');
  }

  if (/\bthis week\b/.test(lower)) {
    const sinceMonday = (dayOfWeek(today) + 6) % 7;
    return range(addDays(today, -sinceMonday), today, 'this week');
  }

  if (/\bthis month\b/.test(lower)) {
    return range(startOfMonth(today), today, 'this month');
  }

  if (/\b(last|previous) month\b/.test(lower)) {
    const ref = parseIsoDate(today);
    const year = ref.getUTCMonth() === 0 ? ref.getUTCFullYear() - 1 : ref.getUTCFullYear();
    const month = (ref.getUTCMonth() + 11) % 12;
    const start = isoFromParts(year, month, 1);
    return start ? range(start, endOfMonth(year, month), 'last month') : null;
  }

  if (/\bthis year\b/.test(lower)) {
    return range(`${today.slice(0, 4)}-01-01`, today, 'this year');
  }

  return null;
};

/**
 * "last Tuesday", "on Friday": most recent such day strictly before the reference date
 */
const matchWeekday: DateMatcher = (text, today) => {
  const m = WEEKDAY_PATTERN.exec(text);
  if (!m) return null;
  const target = WEEKDAYS[m[1].toLowerCase()];
  if (target === undefined) return null;
  let back = (dayOfWeek(today) - target + 7) % 7;
  if (back === 0) back = 7;
  return single(addDays(today, -back), m[0]);
};

const DATE_MATCHERS: DateMatcher[] = [
  matchIso,
  matchMonthDay,
  matchMonthYear,
  matchTodayYesterday,
  matchLastN,
  matchNamedPeriod,
  matchWeekday,
];

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Resolve the first date phrase in the text, or null when there is none
 */
export function resolveDateScope(text: string, today: string): DateScope | null {
  for (const matcher of DATE_MATCHERS) {
    const scope = matcher(text, today);
    if (scope) return scope;
  }
  return null;
}

/**
 * Every "Month D" date in the text, resolved against the reference date,
 * in order of appearance. Impossible days such as "February 30" are skipped.
 */
export function findMonthDayDates(text: string, today: string): string[] {
  const dates: string[] = [];
  for (const m of text.matchAll(MONTH_DAY_GLOBAL)) {
    const date = resolveMonthDay(m[1], m[2], m[3], today);
    if (date) dates.push(date);
  }
  return dates;
}

export function defaultYesterday(today: string): DateScope {
  const date = addDays(today, -1);
  return { kind: 'single', start: date, end: date, phrase: 'yesterday', defaulted: true };
}

export function defaultLastSevenDays(today: string): DateScope {
  return { kind: 'range', start: addDays(today, -6), end: today, phrase: 'last 7 days', defaulted: true };
}
