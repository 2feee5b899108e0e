export {
  CATEGORY_SELECTORS,
  DEFAULT_CATEGORY,
  DEFAULT_CATEGORY_RULES,
} from "./category-config.ts";
export type { CategorySelector } from "./category-config.ts";
export { EVENT_TIME_DEFAULTS, FEED_DEFAULTS, TIME } from "./feed-config.ts";
export { API_TIMEOUT_MS, CAMPUS_API, ENV_KEYS } from "./service-config.ts";
export {
  AUTH_FIELD_LIMITS,
  CONTENT_TYPES,
  EVENT_FIELD_LIMITS,
  HTTP_STATUS,
  SERVER_ERROR_RANGE,
} from "./validation-config.ts";
