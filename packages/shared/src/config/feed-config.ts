export const TIME = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60 * 1000,
  MS_PER_HOUR: 60 * 60 * 1000,
  MS_PER_DAY: 24 * 60 * 60 * 1000,
  SECONDS_PER_DAY: 24 * 60 * 60,
} as const;

export const EVENT_TIME_DEFAULTS = {
  /** Assumed length of an event that has no end instant */
  DEFAULT_DURATION_MS: TIME.MS_PER_HOUR,
  /** Serializers round-trip with up to a minute of drift */
  ALL_DAY_TOLERANCE_SECONDS: 60,
  ALL_DAY_MIN_DURATION_MS: 20 * TIME.MS_PER_HOUR,
  /** 23:59 as seconds after midnight */
  END_OF_DAY_SECONDS: 23 * 3600 + 59 * 60,
  ALL_DAY_LABEL: "All Day",
  RANGE_SEPARATOR: " - ",
} as const;

export const FEED_DEFAULTS = {
  ALL_CATEGORIES: "All",
  FUTURE_ONLY: true,
} as const;
