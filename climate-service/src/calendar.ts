import type { CalendarWindow } from "@climate-delta/types";

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/** `MM-DD`, the date key used by the daily normals files. */
export function windowKey(window: CalendarWindow): string {
  return `${pad2(window.month)}-${pad2(window.day)}`;
}

export function sameWindow(a: CalendarWindow, b: CalendarWindow): boolean {
  return a.month === b.month && a.day === b.day;
}

/**
 * Local calendar date of an instant in an IANA time zone, as `YYYY-MM-DD`.
 * Falls back to UTC when the zone is unknown to the runtime.
 */
export function localDateString(instant: Date, timeZone?: string): string {
  const format = (zone: string) => new Intl.DateTimeFormat("en-CA", {
    timeZone: zone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).format(instant);

  if (timeZone) {
    try {
      return format(timeZone);
    }
    catch (err) {
      if (!(err instanceof RangeError)) throw err;
    }
  }
  return format("UTC");
}

export function windowFromDateString(date: string): CalendarWindow {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(date);
  if (!match) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  return { month: Number(match[2]), day: Number(match[3]) };
}

export function calendarWindowFor(instant: Date, timeZone?: string): CalendarWindow {
  return windowFromDateString(localDateString(instant, timeZone));
}
