export {
  ApiError,
  classifyStatus,
  describeApiError,
  isApiError,
  toApiError,
} from "./api-error-util.ts";
export {
  deriveCategory,
  joinTags,
  splitTags,
} from "./event-category-util.ts";
export {
  buildEventViews,
  filterEvents,
  isInvalidDateRange,
} from "./event-filter-util.ts";
export type { EventViewOptions, FilterOptions } from "./event-filter-util.ts";
export {
  normalizeEvent,
  normalizeUser,
  toEventRequestBody,
} from "./event-normalizer-util.ts";
export {
  buildEventSchedule,
  deriveEventTiming,
  formatEventInstant,
  isAllDayRange,
  parseEventInstant,
} from "./event-time-util.ts";
export type {
  EventSchedule,
  EventScheduleInput,
} from "./event-time-util.ts";
export {
  createLocalCalendar,
  formatDateLabel,
  formatTimeLabel,
  localDateTimeToEpoch,
  parseCalendarDay,
  parseDateOnly,
  resolveLocalTimeZone,
} from "./local-calendar-util.ts";
export type { CalendarDay, LocalDateTime } from "./local-calendar-util.ts";
