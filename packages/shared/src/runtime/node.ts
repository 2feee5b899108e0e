import process from "node:process";

export {
  API_TIMEOUT_MS,
  CAMPUS_API,
  EVENT_FIELD_LIMITS,
  EVENT_TIME_DEFAULTS,
  FEED_DEFAULTS,
  HTTP_STATUS,
  TIME,
} from "../config/index.ts";

import { createRuntimeConfig, type EnvGetter } from "./base.ts";

const envGetter: EnvGetter = (key) => process.env[key];

export const RUNTIME_CONFIG = createRuntimeConfig(envGetter);

export const API_CONFIG = RUNTIME_CONFIG.api;
export const DISPLAY_TIME_ZONE = RUNTIME_CONFIG.timeZone;

export const IS_PRODUCTION = RUNTIME_CONFIG.isProduction;
export const IS_DEVELOPMENT = RUNTIME_CONFIG.isDevelopment;
export const IS_TESTING = RUNTIME_CONFIG.isTesting;
