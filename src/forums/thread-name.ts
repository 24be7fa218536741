import { THREAD_NAME_SEPARATOR } from './thread-resolver.js';

export const THREAD_NAME_MAX = 95;
export const DUE_OFFSET_DAYS = 10;
export const DEFAULT_TIME_ZONE = 'Asia/Tokyo';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Render `month/day` (no zero padding) of `date` in `timeZone`. */
export function formatMonthDay(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, month: 'numeric', day: 'numeric' }).formatToParts(date);
  const month = parts.find((p) => p.type === 'month')?.value ?? '';
  const day = parts.find((p) => p.type === 'day')?.value ?? '';
  return `${Number(month)}/${Number(day)}`;
}

/** Cut to at most `max` code points so surrogate pairs are never split. */
export function truncateName(name: string, max = THREAD_NAME_MAX): string {
  const chars = Array.from(name);
  return chars.length > max ? chars.slice(0, max).join('') : name;
}

/** `<displayName>/<month>/<day>` of the post date plus the due offset. */
export function buildThreadName(displayName: string, createdAt: Date, timeZone = DEFAULT_TIME_ZONE): string {
  const due = new Date(createdAt.getTime() + DUE_OFFSET_DAYS * DAY_MS);
  return truncateName(`${displayName}${THREAD_NAME_SEPARATOR}${formatMonthDay(due, timeZone)}`);
}

/** Throws a RangeError for zones the runtime does not know. */
export function assertTimeZone(timeZone: string): void {
  new Intl.DateTimeFormat('en-US', { timeZone });
}
