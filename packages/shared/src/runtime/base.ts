import { CAMPUS_API, ENV_KEYS } from "../config/service-config.ts";

export type EnvGetter = (key: string) => string | undefined;

const DEFAULT_ENVIRONMENT = "development";

const BOOLEAN_TRUE_VALUES = new Set(["true", "1", "yes"]);

export interface EnvironmentFlagOptions {
  fallbackEnv?: string;
}

export interface ApiConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface RuntimeConfig {
  api: ApiConfig;
  /** IANA zone used for local display; undefined means the host zone */
  timeZone: string | undefined;
  logDebug: boolean;
  env: string;
  isProduction: boolean;
  isDevelopment: boolean;
  isTesting: boolean;
}

export const stringToBoolean = (value: unknown): boolean => {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value !== "string") {
    return false;
  }

  return BOOLEAN_TRUE_VALUES.has(value.toLowerCase());
};

export const resolveEnvValue = (
  getEnv: EnvGetter,
  key: string,
  fallback?: string,
): string | undefined => {
  const value = getEnv(key);
  return value ?? fallback;
};

export const resolveApiBaseUrl = (
  getEnv: EnvGetter,
  fallback: string = CAMPUS_API.BASE_URL,
): string => {
  const value = resolveEnvValue(getEnv, ENV_KEYS.API_URL)?.trim();
  if (!value) {
    return fallback;
  }
  return value.replace(/\/+$/, "");
};

export const resolveApiTimeoutMs = (
  getEnv: EnvGetter,
  fallback: number = CAMPUS_API.TIMEOUT_MS,
): number => {
  const raw = resolveEnvValue(getEnv, ENV_KEYS.API_TIMEOUT_MS);
  if (raw === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

export const isSupportedTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const resolveDisplayTimeZone = (
  getEnv: EnvGetter,
): string | undefined => {
  const value = resolveEnvValue(getEnv, ENV_KEYS.TIME_ZONE)?.trim();
  if (!value || !isSupportedTimeZone(value)) {
    return undefined;
  }
  return value;
};

export const resolveEnvironmentFlags = (
  getEnv: EnvGetter,
  options: EnvironmentFlagOptions = {},
) => {
  const env =
    resolveEnvValue(getEnv, "ENVIRONMENT") ??
    resolveEnvValue(getEnv, "NODE_ENV") ??
    options.fallbackEnv ??
    DEFAULT_ENVIRONMENT;

  return {
    env,
    isProduction: env === "production",
    isDevelopment: env === "development",
    isTesting: env === "test",
  } as const;
};

export const createRuntimeConfig = (getEnv: EnvGetter): RuntimeConfig => {
  const flags = resolveEnvironmentFlags(getEnv);
  const logDebugValue = resolveEnvValue(getEnv, ENV_KEYS.LOG_DEBUG);

  return {
    api: {
      baseUrl: resolveApiBaseUrl(getEnv),
      timeoutMs: resolveApiTimeoutMs(getEnv),
    },
    timeZone: resolveDisplayTimeZone(getEnv),
    // debug output stays on outside production unless switched off explicitly
    logDebug: logDebugValue === undefined
      ? !flags.isProduction
      : stringToBoolean(logDebugValue),
    ...flags,
  };
};
