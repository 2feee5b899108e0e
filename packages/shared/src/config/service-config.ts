export const API_TIMEOUT_MS = 15_000;

export const CAMPUS_API = {
  BASE_URL: "http://localhost:8000",
  TIMEOUT_MS: API_TIMEOUT_MS,
  PATHS: {
    EVENTS: "/events",
    FAVORITES: "/favorites",
    TOKEN: "/token",
    GOOGLE_AUTH: "/auth/google",
    REGISTER: "/users/register",
    CURRENT_USER: "/users/me",
  },
} as const;

export const ENV_KEYS = {
  API_URL: "CAMPUS_FEED_API_URL",
  API_TIMEOUT_MS: "CAMPUS_FEED_API_TIMEOUT_MS",
  TIME_ZONE: "CAMPUS_FEED_TIME_ZONE",
  LOG_DEBUG: "LOG_DEBUG",
} as const;
