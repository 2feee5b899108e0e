import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { z } from "zod";
import { CAMPUS_API } from "../config/service-config.ts";
import { CONTENT_TYPES } from "../config/validation-config.ts";
import type { ApiConfig, RuntimeConfig } from "../runtime/base.ts";
import type {
  Event,
  EventDraft,
  EventsRepository,
  FavoriteRequestBody,
  SessionProvider,
} from "../types.ts";
import { ApiError, toApiError } from "../utils/api-error-util.ts";
import {
  normalizeEvent,
  toEventRequestBody,
} from "../utils/event-normalizer-util.ts";
import {
  eventRecordSchema,
  parseWithSchema,
} from "../validation/api-response-validation.ts";
import { createBearerHeader } from "../validation/auth-validation.ts";
import {
  resolveComponentLogger,
  type ServiceLogger,
} from "./logger-service.ts";

export interface EventsApiServiceOptions {
  session: SessionProvider;
  http?: AxiosInstance;
  config?: ApiConfig;
  logger?: ServiceLogger;
  /** Gates debug output when no logger is given */
  runtime?: Pick<RuntimeConfig, "logDebug">;
}

const DEFAULT_API_CONFIG: ApiConfig = {
  baseUrl: CAMPUS_API.BASE_URL,
  timeoutMs: CAMPUS_API.TIMEOUT_MS,
};

const unknownListSchema = z.array(z.unknown());

export function createHttpClient(
  config: ApiConfig = DEFAULT_API_CONFIG,
): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: { Accept: CONTENT_TYPES.APPLICATION_JSON },
  });
}

/**
 * REST-backed events repository. Reads are public; writes and favorites need
 * the session's bearer token and fail fast without one.
 */
export function createEventsApiService(
  options: EventsApiServiceOptions,
): EventsRepository {
  const http = options.http ?? createHttpClient(options.config);
  const logger = resolveComponentLogger(
    "events-api",
    options.logger,
    options.runtime,
  );
  const { session } = options;
  const { EVENTS, FAVORITES } = CAMPUS_API.PATHS;

  const authHeaders = (action: string): Record<string, string> => {
    const token = session.getAccessToken();
    if (!token) {
      throw new ApiError(
        "unauthorized",
        `You must be logged in to ${action}`,
      );
    }
    return { Authorization: createBearerHeader(token) };
  };

  const send = async (config: AxiosRequestConfig): Promise<unknown> => {
    try {
      const response = await http.request<unknown>(config);
      return response.data;
    } catch (error) {
      const apiError = toApiError(error);
      logger.error("Campus API request failed", apiError, {
        method: config.method,
        url: config.url,
        status: apiError.status,
        code: apiError.code,
      });
      throw apiError;
    }
  };

  const decodeEvent = (payload: unknown, source: string): Event => {
    const parsed = parseWithSchema(eventRecordSchema, payload);
    if (!parsed.success) {
      logger.warn("Campus API returned a malformed event", {
        source,
        errors: parsed.errors,
      });
      throw new ApiError(
        "invalid_response",
        `Unexpected event payload from ${source}`,
        { detail: parsed.errors.join("; ") },
      );
    }
    return normalizeEvent(parsed.data);
  };

  // one malformed record should not hide the rest of the feed
  const decodeEventList = (payload: unknown, source: string): Event[] => {
    const list = parseWithSchema(unknownListSchema, payload);
    if (!list.success) {
      throw new ApiError(
        "invalid_response",
        `Expected a list of events from ${source}`,
        { detail: list.errors.join("; ") },
      );
    }

    const events: Event[] = [];
    list.data.forEach((item, index) => {
      const parsed = parseWithSchema(eventRecordSchema, item);
      if (parsed.success) {
        events.push(normalizeEvent(parsed.data));
      } else {
        logger.warn("Skipping malformed event record", {
          source,
          index,
          errors: parsed.errors,
        });
      }
    });
    return events;
  };

  return {
    async listEvents() {
      const payload = await send({ method: "GET", url: EVENTS });
      const events = decodeEventList(payload, EVENTS);
      logger.debug("Fetched events", { count: events.length });
      return events;
    },

    async getEvent(id) {
      const url = `${EVENTS}/${id}`;
      return decodeEvent(await send({ method: "GET", url }), url);
    },

    async createEvent(draft: EventDraft) {
      const headers = authHeaders("create events");
      const payload = await send({
        method: "POST",
        url: EVENTS,
        headers,
        data: toEventRequestBody(draft),
      });
      const created = decodeEvent(payload, EVENTS);
      logger.info("Event created", { eventId: created.id });
      return created;
    },

    async updateEvent(id, draft) {
      const headers = authHeaders("update events");
      const url = `${EVENTS}/${id}`;
      const payload = await send({
        method: "POST",
        url,
        headers,
        data: toEventRequestBody(draft),
      });
      const updated = decodeEvent(payload, url);
      logger.info("Event updated", { eventId: updated.id });
      return updated;
    },

    async deleteEvent(id) {
      const headers = authHeaders("delete events");
      await send({ method: "DELETE", url: `${EVENTS}/${id}`, headers });
      logger.info("Event deleted", { eventId: id });
    },

    async listFavorites() {
      const headers = authHeaders("view favorites");
      const payload = await send({ method: "GET", url: FAVORITES, headers });
      return decodeEventList(payload, FAVORITES);
    },

    async addFavorite(eventId) {
      const headers = authHeaders("save favorites");
      const body: FavoriteRequestBody = { event_id: eventId };
      await send({ method: "POST", url: FAVORITES, headers, data: body });
      logger.debug("Favorite added", { eventId });
    },

    async removeFavorite(eventId) {
      const headers = authHeaders("save favorites");
      await send({
        method: "DELETE",
        url: `${FAVORITES}/${eventId}`,
        headers,
      });
      logger.debug("Favorite removed", { eventId });
    },
  };
}
