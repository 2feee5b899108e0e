import axios from "axios";
import {
  HTTP_STATUS,
  SERVER_ERROR_RANGE,
} from "../config/validation-config.ts";
import type { ApiErrorCode } from "../types.ts";
import { extractErrorDetail } from "../validation/api-response-validation.ts";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly status: number | null;
  /** Server-provided detail, when the body carried one */
  readonly detail: string | null;

  constructor(
    code: ApiErrorCode,
    message: string,
    options: { status?: number | null; detail?: string | null; cause?: unknown } =
      {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ApiError";
    this.code = code;
    this.status = options.status ?? null;
    this.detail = options.detail ?? null;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function classifyStatus(status: number): ApiErrorCode {
  if (status === HTTP_STATUS.UNAUTHORIZED) return "unauthorized";
  if (status === HTTP_STATUS.FORBIDDEN) return "forbidden";
  if (status === HTTP_STATUS.NOT_FOUND) return "not_found";
  if (
    status === HTTP_STATUS.BAD_REQUEST ||
    status === HTTP_STATUS.CONFLICT ||
    status === HTTP_STATUS.UNPROCESSABLE_ENTITY
  ) {
    return "validation";
  }
  if (status >= SERVER_ERROR_RANGE.MIN && status <= SERVER_ERROR_RANGE.MAX) {
    return "server";
  }
  return "unknown";
}

/**
 * Convert whatever a request threw into an ApiError.
 */
export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) return error;

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, data } = error.response;
      const detail = extractErrorDetail(data);
      return new ApiError(
        classifyStatus(status),
        `API request failed with status ${status}${detail ? `: ${detail}` : ""}`,
        { status, detail, cause: error },
      );
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new ApiError("timeout", "API request timed out", { cause: error });
    }

    return new ApiError("network", `Network error: ${error.message}`, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ApiError("unknown", message, { cause: error });
}

/**
 * Human-readable message for a failed action, e.g. `describeApiError(err, "create events")`.
 */
export function describeApiError(
  error: unknown,
  action = "load events",
): string {
  const apiError = toApiError(error);

  switch (apiError.code) {
    case "network":
      return "No internet connection. Please check your network and try again.";
    case "timeout":
      return "The request took too long. Please try again.";
    case "unauthorized":
      return `You must be logged in to ${action}. Please log in and try again.`;
    case "forbidden":
      return `You don't have permission to ${action}.`;
    case "not_found":
      return "That event no longer exists.";
    case "validation":
      return apiError.detail ??
        "Some of the details are invalid. Please review them and try again.";
    case "server":
      return "Server error. Please try again in a few moments.";
    default:
      return `Failed to ${action}. Please check your connection and try again.`;
  }
}
