import type { RuntimeConfig } from "../runtime/base.ts";
import type { ErrorMetadata, LogMetadata } from "../types.ts";

export interface LoggerOptions {
  /**
   * Determines whether debug logs should be emitted.
   * Defaults to always logging debug messages.
   */
  shouldLogDebug?: () => boolean;
  /**
   * Allows overriding the timestamp generator, primarily for testing.
   */
  now?: () => string;
  /**
   * Metadata merged into every entry, e.g. `{ component: "event-feed" }`.
   */
  context?: LogMetadata;
}

export interface StructuredLogger {
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(
    message: string,
    error?: unknown | null,
    metadata?: ErrorMetadata,
  ): void;
  critical(
    message: string,
    error?: unknown | null,
    metadata?: ErrorMetadata,
  ): void;
  debug(message: string, metadata?: LogMetadata): void;
}

const defaultNow = () => new Date().toISOString();

export interface ServiceLogger {
  info?(message: string, metadata?: Record<string, unknown>): void;
  warn?(message: string, metadata?: Record<string, unknown>): void;
  error?(
    message: string,
    error?: unknown,
    metadata?: Record<string, unknown>,
  ): void;
  debug?(message: string, metadata?: Record<string, unknown>): void;
}

type LoggerLike = Pick<
  StructuredLogger,
  "info" | "warn" | "error" | "debug"
>;

const consoleServiceLogger: Required<ServiceLogger> = {
  info(message, metadata) {
    console.log(message, ...(metadata ? [metadata] : []));
  },
  warn(message, metadata) {
    console.warn(message, ...(metadata ? [metadata] : []));
  },
  error(message, error, metadata) {
    console.error(message, error ?? null, metadata);
  },
  debug(message, metadata) {
    console.debug(message, ...(metadata ? [metadata] : []));
  },
};

export function getConsoleServiceLogger(): Required<ServiceLogger> {
  return consoleServiceLogger;
}

export function resolveServiceLogger(
  logger?: ServiceLogger,
  fallback: Required<ServiceLogger> = consoleServiceLogger,
): Required<ServiceLogger> {
  if (!logger) {
    return fallback;
  }

  return {
    info: logger.info ?? fallback.info,
    warn: logger.warn ?? fallback.warn,
    error: logger.error ?? fallback.error,
    debug: logger.debug ?? fallback.debug,
  };
}

export function createServiceLoggerFromStructuredLogger(
  baseLogger: LoggerLike,
): Required<ServiceLogger> {
  return {
    info(message, metadata) {
      baseLogger.info(message, metadata);
    },
    warn(message, metadata) {
      baseLogger.warn(message, metadata);
    },
    error(message, error, metadata) {
      baseLogger.error(message, error ?? null, metadata);
    },
    debug(message, metadata) {
      baseLogger.debug(message, metadata);
    },
  };
}

function normalizeError(error: unknown): Record<string, unknown> | undefined {
  if (!error) return undefined;

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }

  return { details: error };
}

function write(
  consoleFn: (message?: unknown, ...optionalParams: unknown[]) => void,
  severity: "INFO" | "WARNING" | "ERROR" | "CRITICAL" | "DEBUG",
  message: string,
  metadata: LogMetadata = {},
  now: () => string,
  error?: unknown | null,
): void {
  const payload: Record<string, unknown> = {
    severity,
    message,
    timestamp: now(),
    ...metadata,
  };

  const normalized = normalizeError(error ?? undefined);
  if (normalized) {
    payload.error = normalized;
  }

  try {
    consoleFn(JSON.stringify(payload));
  } catch (serializationError) {
    // Fallback to a safe console output if JSON serialization fails.
    consoleFn(
      JSON.stringify({
        severity: "ERROR",
        message: "Failed to serialize log payload",
        originalMessage: message,
        timestamp: now(),
        serializationError: serializationError instanceof Error
          ? {
            message: serializationError.message,
            stack: serializationError.stack,
            name: serializationError.name,
          }
          : serializationError,
      }),
    );
  }
}

export function createStructuredLogger(
  options: LoggerOptions = {},
): StructuredLogger {
  const {
    shouldLogDebug = () => true,
    now = defaultNow,
    context = {},
  } = options;

  const withContext = (metadata?: LogMetadata): LogMetadata => ({
    ...context,
    ...metadata,
  });

  return {
    info(message, metadata) {
      write(console.log, "INFO", message, withContext(metadata), now);
    },
    warn(message, metadata) {
      write(console.warn, "WARNING", message, withContext(metadata), now);
    },
    error(message, error, metadata) {
      write(console.error, "ERROR", message, withContext(metadata), now, error);
    },
    critical(message, error, metadata) {
      write(
        console.error,
        "CRITICAL",
        message,
        withContext(metadata),
        now,
        error,
      );
    },
    debug(message, metadata) {
      if (!shouldLogDebug()) return;
      write(console.debug, "DEBUG", message, withContext(metadata), now);
    },
  };
}

/**
 * Structured logger for one component, with debug output gated by the
 * runtime configuration.
 */
export function createComponentLogger(
  component: string,
  config: Pick<RuntimeConfig, "logDebug">,
  options: Omit<LoggerOptions, "context" | "shouldLogDebug"> = {},
): Required<ServiceLogger> {
  return createServiceLoggerFromStructuredLogger(
    createStructuredLogger({
      ...options,
      context: { component },
      shouldLogDebug: () => config.logDebug,
    }),
  );
}

/**
 * Logger a service writes to. Methods the caller's logger lacks fall back to
 * a component logger when a runtime config is given, otherwise to the console.
 */
export function resolveComponentLogger(
  component: string,
  logger?: ServiceLogger,
  runtime?: Pick<RuntimeConfig, "logDebug">,
): Required<ServiceLogger> {
  const fallback = runtime
    ? createComponentLogger(component, runtime)
    : consoleServiceLogger;
  return resolveServiceLogger(logger, fallback);
}
