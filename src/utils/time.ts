import { Clock } from "../types";

export const MS_PER_DAY = 86_400_000;

export const systemClock: Clock = () => new Date();

/**
 * A clock frozen at the given instant
 */
export function fixedClock(instant: Date): Clock {
  return () => new Date(instant.getTime());
}

export function addDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * MS_PER_DAY);
}

/**
 * Fractional days between two instants, never negative
 */
export function elapsedDays(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Last millisecond of the local calendar day containing `instant`
 */
export function endOfDay(instant: Date): Date {
  const end = new Date(instant.getTime());
  end.setHours(23, 59, 59, 999);
  return end;
}

/**
 * YYYY-MM-DD in local time
 */
export function formatDate(instant: Date): string {
  const year = instant.getFullYear();
  const month = String(instant.getMonth() + 1).padStart(2, "0");
  const day = String(instant.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parses YYYY-MM-DD as local midnight. Returns undefined for anything else.
 */
export function parseDate(value: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return undefined;

  const [, year, month, day] = match;
  const parsed = new Date(Number(year), Number(month) - 1, Number(day));
  if (parsed.getMonth() !== Number(month) - 1) return undefined;
  return parsed;
}
