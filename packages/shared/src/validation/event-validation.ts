import { EVENT_FIELD_LIMITS } from "../config/validation-config.ts";
import type {
  EventDraft,
  LocalCalendar,
  ValidationResult,
} from "../types.ts";
import { parseEventInstant } from "../utils/event-time-util.ts";
import { createLocalCalendar } from "../utils/local-calendar-util.ts";
import { validateString } from "./data-validation.ts";

export const EVENT_VALIDATION_MESSAGES = {
  NAME_REQUIRED: "Please enter an event name",
  LOCATION_REQUIRED: "Please enter a location",
  START_INVALID: "Please choose a valid start date and time",
  END_INVALID: "Please choose a valid end date and time",
  END_DATE_BEFORE_START: "End date must be after start date",
  END_TIME_BEFORE_START: "End time must be after start time",
} as const;

/**
 * Validate an event form before it is submitted for create or update.
 * Mirrors the constraints the API enforces so users see the problem early.
 */
export function validateEventDraft(
  draft: EventDraft,
  calendar: LocalCalendar = createLocalCalendar(),
): ValidationResult {
  const errors: string[] = [];

  if (!draft.name.trim()) {
    errors.push(EVENT_VALIDATION_MESSAGES.NAME_REQUIRED);
  } else {
    const name = validateString(draft.name, {
      label: "Event name",
      maxLength: EVENT_FIELD_LIMITS.NAME_MAX_LENGTH,
    });
    if (name.error) errors.push(name.error);
  }

  if (!draft.location.trim()) {
    errors.push(EVENT_VALIDATION_MESSAGES.LOCATION_REQUIRED);
  } else {
    const location = validateString(draft.location, {
      label: "Location",
      maxLength: EVENT_FIELD_LIMITS.LOCATION_MAX_LENGTH,
    });
    if (location.error) errors.push(location.error);
  }

  if (draft.description) {
    const description = validateString(draft.description, {
      label: "Description",
      maxLength: EVENT_FIELD_LIMITS.DESCRIPTION_MAX_LENGTH,
      allowEmpty: true,
    });
    if (description.error) errors.push(description.error);
  }

  if (draft.host) {
    const host = validateString(draft.host, {
      label: "Host name",
      maxLength: EVENT_FIELD_LIMITS.HOST_MAX_LENGTH,
      allowEmpty: true,
    });
    if (host.error) errors.push(host.error);
  }

  const start = parseEventInstant(draft.startsAt);
  if (start.kind === "unparsed") {
    errors.push(EVENT_VALIDATION_MESSAGES.START_INVALID);
  } else if (draft.endsAt) {
    const end = parseEventInstant(draft.endsAt);
    if (end.kind === "unparsed") {
      errors.push(EVENT_VALIDATION_MESSAGES.END_INVALID);
    } else if (end.epochMs < start.epochMs) {
      const sameDay = calendar.dayKey(end.epochMs) ===
        calendar.dayKey(start.epochMs);
      errors.push(
        sameDay
          ? EVENT_VALIDATION_MESSAGES.END_TIME_BEFORE_START
          : EVENT_VALIDATION_MESSAGES.END_DATE_BEFORE_START,
      );
    }
  }

  return { valid: errors.length === 0, errors };
}
