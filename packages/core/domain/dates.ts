/**
 * Calendar-day helpers.
 *
 * Every date in a snapshot is an ISO day string (YYYY-MM-DD) in UTC, and all
 * arithmetic is in whole days.
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** ISO day string, e.g. `2024-03-01`. */
export type IsoDay = string;

/** Source of the current instant; injected so tests can pin "today". */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Format an instant as its UTC calendar day.
 */
export function formatDay(date: Date): IsoDay {
  return date.toISOString().slice(0, 10);
}

export function today(clock: Clock = systemClock): IsoDay {
  return formatDay(clock());
}

/**
 * Parse an ISO day. Returns null for anything that is not a real calendar day
 * (wrong shape, month 13, Feb 30 ...).
 */
export function parseDay(value: string): Date | null {
  const match = ISO_DAY.exec(value);
  if (!match) {
    return null;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatDay(date) === value ? date : null;
}

export function isIsoDay(value: string): boolean {
  return parseDay(value) !== null;
}

/**
 * Add whole days to an ISO day.
 *
 * @throws RangeError if `day` is not a valid ISO day
 */
export function addDays(day: IsoDay, days: number): IsoDay {
  const parsed = parseDay(day);
  if (!parsed) {
    throw new RangeError(`Invalid ISO day: ${day}`);
  }
  return formatDay(new Date(parsed.getTime() + days * DAY_MS));
}

/**
 * Whole days from `from` to `to` (positive when `to` is later).
 * Returns null when either side does not parse.
 */
export function daysBetween(from: IsoDay, to: IsoDay): number | null {
  const a = parseDay(from);
  const b = parseDay(to);
  if (!a || !b) {
    return null;
  }
  return Math.round((b.getTime() - a.getTime()) / DAY_MS);
}
