const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const addDays = (date: Date, days: number) =>
  new Date(date.getTime() + days * DAY_MS);

export const addHours = (date: Date, hours: number) =>
  new Date(date.getTime() + hours * HOUR_MS);

/** Whole days left before `expiresAt`, never negative. */
export function daysUntil(expiresAt: Date, now: Date = new Date()): number {
  return Math.max(0, Math.ceil((expiresAt.getTime() - now.getTime()) / DAY_MS));
}
