export const EVENT_FIELD_LIMITS = {
  NAME_MAX_LENGTH: 120,
  LOCATION_MAX_LENGTH: 160,
  DESCRIPTION_MAX_LENGTH: 10_000,
  HOST_MAX_LENGTH: 300,
} as const;

export const AUTH_FIELD_LIMITS = {
  PASSWORD_MIN_LENGTH: 6,
  NAME_MAX_LENGTH: 120,
} as const;

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export const SERVER_ERROR_RANGE = {
  MIN: 500,
  MAX: 599,
} as const;

export const CONTENT_TYPES = {
  APPLICATION_JSON: "application/json",
  APPLICATION_X_WWW_FORM_URLENCODED: "application/x-www-form-urlencoded",
} as const;
