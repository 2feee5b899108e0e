/**
 * Services log to the console unless given a logger. Pass `runtime`
 * (for example `RUNTIME_CONFIG` from `./runtime/node`) to get structured
 * component loggers with debug output gated by `LOG_DEBUG`.
 */
export * from "./config/index.ts";
export * from "./services/index.ts";
export * from "./utils/index.ts";
export * from "./validation/index.ts";
export type * from "./types.ts";
export type { ApiConfig, EnvGetter, RuntimeConfig } from "./runtime/base.ts";
export { createRuntimeConfig } from "./runtime/base.ts";
