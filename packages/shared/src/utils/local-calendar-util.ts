import type { CalendarParts, LocalCalendar } from "../types.ts";

const MONTH_SHORT_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

const pad2 = (value: number): string => String(value).padStart(2, "0");

export function resolveLocalTimeZone(): string {
  return new Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Build a calendar that reads instants in the given IANA time zone.
 * Without a zone the host's local zone is used.
 */
export function createLocalCalendar(timeZone?: string): LocalCalendar {
  const zone = timeZone ?? resolveLocalTimeZone();
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: zone,
    hourCycle: "h23",
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
    weekday: "long",
  });

  const partsOf = (epochMs: number): CalendarParts => {
    const result: CalendarParts = {
      year: 0,
      month: 0,
      day: 0,
      hour: 0,
      minute: 0,
      second: 0,
      weekday: "",
    };

    for (const part of formatter.formatToParts(epochMs)) {
      switch (part.type) {
        case "year":
          result.year = Number(part.value);
          break;
        case "month":
          result.month = Number(part.value);
          break;
        case "day":
          result.day = Number(part.value);
          break;
        case "hour":
          // some ICU builds still emit "24" for midnight
          result.hour = Number(part.value) % 24;
          break;
        case "minute":
          result.minute = Number(part.value);
          break;
        case "second":
          result.second = Number(part.value);
          break;
        case "weekday":
          result.weekday = part.value;
          break;
        default:
          break;
      }
    }

    return result;
  };

  return {
    timeZone: zone,
    partsOf,
    dayKey(epochMs) {
      return toDayKey(partsOf(epochMs));
    },
  };
}

export function toDayKey(
  parts: Pick<CalendarParts, "year" | "month" | "day">,
): number {
  return parts.year * 10_000 + parts.month * 100 + parts.day;
}

export function secondsIntoDay(parts: CalendarParts): number {
  return parts.hour * 3600 + parts.minute * 60 + parts.second;
}

/** "Thursday, Jan 15, 2026" */
export function formatDateLabel(parts: CalendarParts): string {
  const month = MONTH_SHORT_NAMES[parts.month - 1] ?? String(parts.month);
  return `${parts.weekday}, ${month} ${pad2(parts.day)}, ${parts.year}`;
}

/** "6:05 PM" */
export function formatTimeLabel(parts: CalendarParts): string {
  const suffix = parts.hour < 12 ? "AM" : "PM";
  const hour12 = parts.hour % 12 === 0 ? 12 : parts.hour % 12;
  return `${hour12}:${pad2(parts.minute)} ${suffix}`;
}

export type CalendarDay = Pick<CalendarParts, "year" | "month" | "day">;

export type LocalDateTime = Omit<CalendarParts, "weekday">;

/**
 * Parse a YYYY-MM-DD string into calendar fields, rejecting impossible dates.
 */
export function parseCalendarDay(value: string): CalendarDay | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }

  return { year, month, day };
}

/**
 * Parse a date in YYYY-MM-DD format into the instant of midnight on that day
 * in the calendar's zone, so that `calendar.dayKey` maps it back to the same
 * day. Defaults to the host zone.
 */
export function parseDateOnly(
  value: string,
  calendar: LocalCalendar = createLocalCalendar(),
): Date | undefined {
  const parts = parseCalendarDay(value);
  if (!parts) return undefined;
  return new Date(
    localDateTimeToEpoch(calendar, { ...parts, hour: 0, minute: 0, second: 0 }),
  );
}

/**
 * Find the instant at which the calendar's wall clock shows the given time.
 * Wall times skipped by a DST jump have no exact match; the last guess is kept.
 */
export function localDateTimeToEpoch(
  calendar: LocalCalendar,
  target: LocalDateTime,
): number {
  const wanted = Date.UTC(
    target.year,
    target.month - 1,
    target.day,
    target.hour,
    target.minute,
    target.second,
  );

  let guess = wanted;
  for (let pass = 0; pass < 3; pass++) {
    const seen = calendar.partsOf(guess);
    const shown = Date.UTC(
      seen.year,
      seen.month - 1,
      seen.day,
      seen.hour,
      seen.minute,
      seen.second,
    );
    if (shown === wanted) break;
    guess += wanted - shown;
  }

  return guess;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
