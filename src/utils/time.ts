interface ZonedParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const fmt = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
    hourCycle: "h23",
  });
  const values = new Map<string, number>();
  for (const part of fmt.formatToParts(date)) {
    if (part.type !== "literal") values.set(part.type, Number(part.value));
  }
  const get = (type: string): number => values.get(type) ?? 0;
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
  };
}

/** Offset of `timeZone` from UTC at `date`, in milliseconds (east positive). */
function zoneOffsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/** Width of the window searched for a DST jump that skips local midnight. */
const GAP_SEARCH_MS = 3 * 60 * 60 * 1000;
const SECOND_MS = 1000;

function midnight(year: number, month: number, day: number, timeZone: string): Date {
  const midnightAsUtc = Date.UTC(year, month - 1, day);
  let instant = midnightAsUtc - zoneOffsetMs(new Date(midnightAsUtc), timeZone);
  // Second pass picks up a DST change between UTC midnight and local midnight
  instant = midnightAsUtc - zoneOffsetMs(new Date(instant), timeZone);

  const target = formatDate(year, month, day);
  if (calendarDate(new Date(instant), timeZone) >= target) return new Date(instant);

  // Local midnight does not exist (clocks jumped from 23:59:59 to 01:00);
  // the day starts at the first second carrying the target date
  let before = instant;
  let after = instant + GAP_SEARCH_MS;
  while (after - before > SECOND_MS) {
    const mid = before + Math.floor((after - before) / 2 / SECOND_MS) * SECOND_MS;
    if (calendarDate(new Date(mid), timeZone) < target) before = mid;
    else after = mid;
  }
  return new Date(after);
}

function formatDate(year: number, month: number, day: number): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${year}-${pad(month)}-${pad(day)}`;
}

/** First instant of the calendar day containing `now` in `timeZone`. */
export function startOfDay(now: Date, timeZone: string): Date {
  const p = zonedParts(now, timeZone);
  return midnight(p.year, p.month, p.day, timeZone);
}

/** First instant of the `YYYY-MM-DD` calendar date in `timeZone`. */
export function startOfCalendarDate(date: string, timeZone: string): Date {
  const [year = 1970, month = 1, day = 1] = date.split("-").map(Number);
  return midnight(year, month, day, timeZone);
}

/** `YYYY-MM-DD` of `date` in `timeZone`. */
export function calendarDate(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return formatDate(p.year, p.month, p.day);
}
