import type { Duration } from "./types.js";

const MINUTE_MS = 60_000;

/** Number of days in a month (0-based month, UTC). */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

/**
 * Subtract a calendar-like duration from an instant, in UTC.
 *
 * Years and months move the calendar date and clamp the day to the target
 * month's length (31 Mar - 1 month = 28/29 Feb). Days, hours and minutes are
 * then subtracted as fixed lengths.
 */
export function subtractDuration(from: Date, duration: Duration): Date {
  const years = duration.years ?? 0;
  const months = duration.months ?? 0;

  let anchor = from;
  if (years !== 0 || months !== 0) {
    const totalMonths = from.getUTCFullYear() * 12 + from.getUTCMonth() - years * 12 - months;
    const year = Math.floor(totalMonths / 12);
    const month = totalMonths - year * 12;
    const day = Math.min(from.getUTCDate(), daysInMonth(year, month));
    anchor = new Date(
      Date.UTC(
        year,
        month,
        day,
        from.getUTCHours(),
        from.getUTCMinutes(),
        from.getUTCSeconds(),
        from.getUTCMilliseconds(),
      ),
    );
  }

  const fixedMinutes = (duration.days ?? 0) * 24 * 60 + (duration.hours ?? 0) * 60 + (duration.minutes ?? 0);
  return new Date(anchor.getTime() - fixedMinutes * MINUTE_MS);
}

/** Human-readable form, e.g. "1d 12h". Used in logs and the `list` command. */
export function formatDuration(duration: Duration): string {
  const parts: string[] = [];
  if (duration.years) parts.push(`${duration.years}y`);
  if (duration.months) parts.push(`${duration.months}mo`);
  if (duration.days) parts.push(`${duration.days}d`);
  if (duration.hours) parts.push(`${duration.hours}h`);
  if (duration.minutes) parts.push(`${duration.minutes}m`);
  return parts.length > 0 ? parts.join(" ") : "0m";
}
