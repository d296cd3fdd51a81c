/**
 * Calendar-date helpers. Dates travel as yyyy-MM-dd strings, which sort
 * lexically in calendar order.
 *
 * `parseDate` also accepts the shorthand the CLI offers: today, tomorrow,
 * yesterday, +3d / +2w / +1m, weekday names (next occurrence), and month+day
 * such as jan15 (rolled into next year when already past).
 */

import type { IsoDate } from '../types/task.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;

const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];
const WEEKDAY_NAMES = new Set([
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
]);
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/** Format a local Date as yyyy-MM-dd */
export function formatDate(d: Date): IsoDate {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/** True for a real calendar date in yyyy-MM-dd form (rejects 2026-02-30) */
export function isIsoDate(value: string): boolean {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return false;
  const [, y, mo, d] = m.map(Number);
  if (y === undefined || mo === undefined || d === undefined) return false;
  const date = new Date(y, mo - 1, d);
  return date.getFullYear() === y && date.getMonth() === mo - 1 && date.getDate() === d;
}

/** Negative when a is earlier, zero when equal, positive when later */
export function compareDates(a: IsoDate, b: IsoDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Whole days from `from` to `to` (both yyyy-MM-dd) */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  const a = new Date(`${from}T00:00:00`);
  const b = new Date(`${to}T00:00:00`);
  return Math.round((b.getTime() - a.getTime()) / 86_400_000);
}

type Resolver = (input: string, today: Date) => Date | null;

const resolvers: Resolver[] = [
  (input, today) => {
    switch (input) {
      case 'today': return today;
      case 'tomorrow': return addDays(today, 1);
      case 'yesterday': return addDays(today, -1);
      default: return null;
    }
  },
  (input, today) => {
    const m = RELATIVE_RE.exec(input);
    if (!m?.[1]) return null;
    const count = parseInt(m[1], 10);
    if (m[2] === 'd') return addDays(today, count);
    if (m[2] === 'w') return addDays(today, count * 7);
    const r = new Date(today);
    r.setMonth(r.getMonth() + count);
    return r;
  },
  (input, today) => {
    if (input.length !== 3 && !WEEKDAY_NAMES.has(input)) return null;
    const target = WEEKDAYS.indexOf(input.slice(0, 3));
    if (target < 0) return null;
    const ahead = (target - today.getDay() + 7) % 7 || 7;
    return addDays(today, ahead);
  },
  (input, today) => {
    const m = MONTH_DAY_RE.exec(input);
    if (!m?.[1] || !m[2]) return null;
    const month = MONTHS.indexOf(m[1]);
    const day = parseInt(m[2], 10);
    const candidate = new Date(today.getFullYear(), month, day);
    if (candidate.getMonth() !== month || candidate.getDate() !== day) return null;
    if (candidate < today) candidate.setFullYear(candidate.getFullYear() + 1);
    return candidate;
  },
];


/**
 * Parse a date as typed by a user into yyyy-MM-dd, or null when it can't be
 * understood.
 *
 * @param now - Override "today" for testing
 */
export function parseDate(input: string | null | undefined, now?: Date): IsoDate | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;
  if (isIsoDate(trimmed)) return trimmed;

  const base = now ?? new Date();
  const today = new Date(base.getFullYear(), base.getMonth(), base.getDate());
  const normalized = trimmed.toLowerCase();

  for (const resolve of resolvers) {
    const date = resolve(normalized, today);
    if (date) return formatDate(date);
  }
  return null;
}
