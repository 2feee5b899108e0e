import { EVENT_TIME_DEFAULTS, TIME } from "../config/feed-config.ts";
import type {
  EventTimeOptions,
  EventTiming,
  LocalCalendar,
  ParsedInstant,
} from "../types.ts";
import {
  createLocalCalendar,
  daysInMonth,
  formatDateLabel,
  formatTimeLabel,
  localDateTimeToEpoch,
  parseCalendarDay,
  secondsIntoDay,
} from "./local-calendar-util.ts";

export interface EventScheduleInput {
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD, read only for multi-day events */
  endDate?: string;
  /** HH:mm, ignored for all-day events */
  time?: string;
  isAllDay: boolean;
  isMultiDay: boolean;
}

export interface EventSchedule {
  startsAt: string;
  endsAt: string;
}

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

const ISO_FRACTIONAL_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,9})(Z|[+-]\d{2}:?\d{2})?$/;
const ISO_SIMPLE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:?\d{2})?$/;

let defaultCalendar: LocalCalendar | null = null;

const resolveCalendar = (calendar?: LocalCalendar): LocalCalendar => {
  if (calendar) return calendar;
  if (!defaultCalendar) {
    defaultCalendar = createLocalCalendar();
  }
  return defaultCalendar;
};

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z") return 0;

  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;

  return sign * (hours * 60 + minutes);
}

function toEpochMs(
  fields: string[],
  fraction: string,
  offset: string | undefined,
): number | null {
  const [year, month, day, hour, minute, second] = fields.map(Number);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  // sub-millisecond digits are truncated
  const millis = Number(fraction.padEnd(3, "0").slice(0, 3));

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  return date.getTime() - offsetMinutes * TIME.MS_PER_MINUTE;
}

/**
 * Parse an ISO-8601 timestamp from the API.
 * Tries the fractional-seconds form first, then the plain seconds form.
 * A missing offset is read as UTC. Never throws.
 */
export function parseEventInstant(raw: string | null | undefined): ParsedInstant {
  const value = (raw ?? "").trim();

  const fractional = ISO_FRACTIONAL_PATTERN.exec(value);
  if (fractional) {
    const epochMs = toEpochMs(
      fractional.slice(1, 7),
      fractional[7],
      fractional[8],
    );
    if (epochMs !== null) return { kind: "parsed", epochMs };
  }

  const simple = ISO_SIMPLE_PATTERN.exec(value);
  if (simple) {
    const epochMs = toEpochMs(simple.slice(1, 7), "", simple[7]);
    if (epochMs !== null) return { kind: "parsed", epochMs };
  }

  return { kind: "unparsed", raw: raw ?? "" };
}

/** Canonical wire form: YYYY-MM-DDTHH:mm:ss.sssZ */
export function formatEventInstant(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

function isNearMidnight(secondsOfDay: number): boolean {
  const fromMidnight = Math.min(
    secondsOfDay,
    TIME.SECONDS_PER_DAY - secondsOfDay,
  );
  return fromMidnight <= EVENT_TIME_DEFAULTS.ALL_DAY_TOLERANCE_SECONDS;
}

function isNearEndOfDay(secondsOfDay: number): boolean {
  return Math.abs(secondsOfDay - EVENT_TIME_DEFAULTS.END_OF_DAY_SECONDS) <=
    EVENT_TIME_DEFAULTS.ALL_DAY_TOLERANCE_SECONDS;
}

/**
 * All-day when the local start is midnight and the event either ends at 23:59
 * or lasts at least 20 hours. Events without an end are never all-day.
 */
export function isAllDayRange(
  startMs: number,
  endMs: number | null,
  calendar?: LocalCalendar,
): boolean {
  if (endMs === null) return false;

  const cal = resolveCalendar(calendar);
  if (!isNearMidnight(secondsIntoDay(cal.partsOf(startMs)))) return false;

  return isNearEndOfDay(secondsIntoDay(cal.partsOf(endMs))) ||
    endMs - startMs >= EVENT_TIME_DEFAULTS.ALL_DAY_MIN_DURATION_MS;
}

/**
 * Derive the normalized instants and display labels for an event's time span.
 * An unparseable start yields the "unparsed" state with the raw string as its
 * date label; an unparseable end is treated as missing.
 */
export function deriveEventTiming(
  startsAt: string,
  endsAt?: string | null,
  options: EventTimeOptions = {},
): EventTiming {
  const start = parseEventInstant(startsAt);
  if (start.kind === "unparsed") {
    return {
      status: "unparsed",
      raw: start.raw,
      isAllDay: false,
      isMultiDay: false,
      displayDateLabel: start.raw,
      displayTimeLabel: "",
    };
  }

  const calendar = resolveCalendar(options.calendar);
  const end = endsAt ? parseEventInstant(endsAt) : null;
  const normalizedStart = start.epochMs;
  const normalizedEnd = end?.kind === "parsed" ? end.epochMs : null;
  const effectiveEnd = normalizedEnd ??
    normalizedStart + EVENT_TIME_DEFAULTS.DEFAULT_DURATION_MS;

  const startParts = calendar.partsOf(normalizedStart);
  const endParts = normalizedEnd === null
    ? null
    : calendar.partsOf(normalizedEnd);
  const startDayKey = calendar.dayKey(normalizedStart);
  const endDayKey = normalizedEnd === null
    ? null
    : calendar.dayKey(normalizedEnd);

  const isAllDay = isAllDayRange(normalizedStart, normalizedEnd, calendar);
  const isMultiDay = endDayKey !== null && endDayKey !== startDayKey;

  const displayDateLabel = isMultiDay && endParts
    ? `${formatDateLabel(startParts)}${EVENT_TIME_DEFAULTS.RANGE_SEPARATOR}${
      formatDateLabel(endParts)
    }`
    : formatDateLabel(startParts);

  let displayTimeLabel: string;
  if (isAllDay) {
    displayTimeLabel = EVENT_TIME_DEFAULTS.ALL_DAY_LABEL;
  } else if (endParts) {
    displayTimeLabel = `${formatTimeLabel(startParts)}${
      EVENT_TIME_DEFAULTS.RANGE_SEPARATOR
    }${formatTimeLabel(endParts)}`;
  } else if (options.useDefaultEnd) {
    displayTimeLabel = `${formatTimeLabel(startParts)}${
      EVENT_TIME_DEFAULTS.RANGE_SEPARATOR
    }${formatTimeLabel(calendar.partsOf(effectiveEnd))}`;
  } else {
    displayTimeLabel = formatTimeLabel(startParts);
  }

  return {
    status: "parsed",
    normalizedStart,
    normalizedEnd,
    effectiveEnd,
    durationMs: effectiveEnd - normalizedStart,
    startDayKey,
    endDayKey,
    isAllDay,
    isMultiDay,
    displayDateLabel,
    displayTimeLabel,
  };
}

function parseTimeOfDay(
  value: string | undefined,
): { hour: number; minute: number } | null {
  const match = value ? TIME_OF_DAY_PATTERN.exec(value.trim()) : null;
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * Turn the add/edit form's date and time pickers into wire timestamps.
 * All-day events run from local midnight to 23:59:59 of the last day. A timed
 * single-day event lasts one hour; a timed multi-day event ends at the same
 * time on its end date. Returns null when a date or time cannot be read.
 */
export function buildEventSchedule(
  input: EventScheduleInput,
  calendar?: LocalCalendar,
): EventSchedule | null {
  const cal = resolveCalendar(calendar);
  const startDay = parseCalendarDay(input.startDate);
  if (!startDay) return null;

  const endDay = input.isMultiDay
    ? parseCalendarDay(input.endDate ?? "")
    : startDay;
  if (!endDay) return null;

  if (input.isAllDay) {
    const start = localDateTimeToEpoch(cal, {
      ...startDay,
      hour: 0,
      minute: 0,
      second: 0,
    });
    const end = localDateTimeToEpoch(cal, {
      ...endDay,
      hour: 23,
      minute: 59,
      second: 59,
    });
    return {
      startsAt: formatEventInstant(start),
      endsAt: formatEventInstant(end),
    };
  }

  const time = parseTimeOfDay(input.time);
  if (!time) return null;

  const start = localDateTimeToEpoch(cal, { ...startDay, ...time, second: 0 });
  const end = input.isMultiDay
    ? localDateTimeToEpoch(cal, { ...endDay, ...time, second: 0 })
    : start + EVENT_TIME_DEFAULTS.DEFAULT_DURATION_MS;

  return {
    startsAt: formatEventInstant(start),
    endsAt: formatEventInstant(end),
  };
}
