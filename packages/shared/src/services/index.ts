export {
  createEventFeedStore,
} from "./event-feed-store.ts";

export {
  createEventsApiService,
  createHttpClient,
} from "./events-api-service.ts";

export {
  createComponentLogger,
  createServiceLoggerFromStructuredLogger,
  createStructuredLogger,
  getConsoleServiceLogger,
  resolveComponentLogger,
  resolveServiceLogger,
} from "./logger-service.ts";

export { createSessionService } from "./session-service.ts";

export type {
  EventFeedListener,
  EventFeedState,
  EventFeedStore,
  EventFeedStoreOptions,
  FeedFilters,
  FeedStatus,
  SaveEventResult,
} from "./event-feed-store.ts";

export type { EventsApiServiceOptions } from "./events-api-service.ts";

export type {
  LoggerOptions,
  ServiceLogger,
  StructuredLogger,
} from "./logger-service.ts";

export type {
  SessionListener,
  SessionService,
  SessionServiceOptions,
  SessionSnapshot,
} from "./session-service.ts";
