import { DEFAULT_CATEGORY_RULES } from "../config/category-config.ts";
import { FEED_DEFAULTS } from "../config/feed-config.ts";
import type {
  CategoryRule,
  DateRange,
  Event,
  EventDraft,
  EventsRepository,
  EventView,
  LocalCalendar,
  SessionProvider,
} from "../types.ts";
import { describeApiError } from "../utils/api-error-util.ts";
import { buildEventViews, filterEvents } from "../utils/event-filter-util.ts";
import { createLocalCalendar } from "../utils/local-calendar-util.ts";
import { validateEventDraft } from "../validation/event-validation.ts";
import type { RuntimeConfig } from "../runtime/base.ts";
import {
  resolveComponentLogger,
  type ServiceLogger,
} from "./logger-service.ts";

export type FeedStatus = "idle" | "loading" | "ready" | "error";

export interface FeedFilters {
  category: string;
  query: string;
  range: DateRange | null;
  futureOnly: boolean;
  /** Show only the user's favorites, as the saved-events list does */
  favoritesOnly: boolean;
}

export interface EventFeedState {
  status: FeedStatus;
  events: readonly Event[];
  favorites: ReadonlySet<number>;
  filters: FeedFilters;
  /** Filtered and sorted, ready to render */
  visible: readonly EventView[];
  error: string | null;
}

export type EventFeedListener = (state: EventFeedState) => void;

export type SaveEventResult =
  | { ok: true; event: Event }
  | { ok: false; errors: string[] };

export interface EventFeedStore {
  getState(): EventFeedState;
  subscribe(listener: EventFeedListener): () => void;
  /** Never rejects; failures land in `state.error` */
  refresh(): Promise<void>;
  setFilters(patch: Partial<FeedFilters>): void;
  /** Resolves to whether the event is a favorite afterwards */
  toggleFavorite(eventId: number): Promise<boolean>;
  saveEvent(draft: EventDraft, eventId?: number): Promise<SaveEventResult>;
  deleteEvent(eventId: number): Promise<boolean>;
  clearError(): void;
  dispose(): void;
}

export interface EventFeedStoreOptions {
  repository: EventsRepository;
  session?: SessionProvider;
  calendar?: LocalCalendar;
  now?: () => Date;
  logger?: ServiceLogger;
  /** Gates debug output when no logger is given */
  runtime?: Pick<RuntimeConfig, "logDebug">;
  categoryRules?: readonly CategoryRule[];
  useDefaultEnd?: boolean;
  filters?: Partial<FeedFilters>;
}

const DEFAULT_FILTERS: FeedFilters = {
  category: FEED_DEFAULTS.ALL_CATEGORIES,
  query: "",
  range: null,
  futureOnly: FEED_DEFAULTS.FUTURE_ONLY,
  favoritesOnly: false,
};

/**
 * Feed state for the presentation layer. Every change to the events,
 * favorites or filters re-runs the pure view and filter pipeline and is
 * pushed to subscribers.
 */
export function createEventFeedStore(
  options: EventFeedStoreOptions,
): EventFeedStore {
  const { repository, session } = options;
  const calendar = options.calendar ?? createLocalCalendar();
  const now = options.now ?? (() => new Date());
  const logger = resolveComponentLogger(
    "event-feed-store",
    options.logger,
    options.runtime,
  );
  const categoryRules = options.categoryRules ?? DEFAULT_CATEGORY_RULES;
  const listeners = new Set<EventFeedListener>();

  let requestSeq = 0;
  // bumped on every local favorites change so a slower refresh cannot undo it
  let favoritesVersion = 0;
  let disposed = false;
  let state: EventFeedState = {
    status: "idle",
    events: [],
    favorites: new Set<number>(),
    filters: { ...DEFAULT_FILTERS, ...options.filters },
    visible: [],
    error: null,
  };

  const computeVisible = (
    events: readonly Event[],
    favorites: ReadonlySet<number>,
    filters: FeedFilters,
  ): EventView[] => {
    const views = buildEventViews(events, {
      calendar,
      favorites,
      categoryRules,
      useDefaultEnd: options.useDefaultEnd,
      currentUserId: session?.getCurrentUser?.()?.id ?? null,
    });
    return filterEvents(views, { ...filters, now: now() }, { calendar });
  };

  const update = (patch: Partial<EventFeedState>) => {
    if (disposed) return;

    const next = { ...state, ...patch };
    if (
      patch.events !== undefined ||
      patch.favorites !== undefined ||
      patch.filters !== undefined
    ) {
      next.visible = computeVisible(next.events, next.favorites, next.filters);
    }
    state = next;

    for (const listener of listeners) {
      listener(state);
    }
  };

  const loadFavorites = async (): Promise<ReadonlySet<number>> => {
    if (!session?.isSignedIn()) return new Set<number>();

    try {
      const favorites = await repository.listFavorites();
      return new Set(favorites.map((event) => event.id));
    } catch (error) {
      logger.warn("Could not load favorites; keeping the previous set", {
        error: describeApiError(error, "view favorites"),
      });
      return state.favorites;
    }
  };

  const refresh = async (): Promise<void> => {
    if (disposed) return;

    requestSeq += 1;
    const seq = requestSeq;
    const startVersion = favoritesVersion;
    update({ status: "loading", error: null });

    try {
      const [events, favorites] = await Promise.all([
        repository.listEvents(),
        loadFavorites(),
      ]);

      if (disposed || seq !== requestSeq) {
        logger.debug("Discarding superseded refresh", { seq });
        return;
      }

      const favoritesChanged = startVersion !== favoritesVersion;
      if (favoritesChanged) {
        logger.debug("Keeping favorites changed during refresh", { seq });
      }
      update({
        status: "ready",
        events,
        favorites: favoritesChanged ? state.favorites : favorites,
      });
      logger.debug("Feed refreshed", {
        events: events.length,
        visible: state.visible.length,
      });
    } catch (error) {
      if (disposed || seq !== requestSeq) {
        logger.debug("Discarding superseded refresh failure", {
          seq,
          error: describeApiError(error),
        });
        return;
      }

      logger.error("Failed to refresh events", error);
      update({ status: "error", error: describeApiError(error) });
    }
  };

  return {
    getState() {
      return state;
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    refresh,

    setFilters(patch) {
      update({ filters: { ...state.filters, ...patch } });
    },

    async toggleFavorite(eventId) {
      const wasFavorite = state.favorites.has(eventId);

      try {
        if (wasFavorite) {
          await repository.removeFavorite(eventId);
        } else {
          await repository.addFavorite(eventId);
        }
      } catch (error) {
        logger.error("Failed to update favorite", error, { eventId });
        update({ error: describeApiError(error, "save favorites") });
        return wasFavorite;
      }

      const favorites = new Set(state.favorites);
      if (wasFavorite) {
        favorites.delete(eventId);
      } else {
        favorites.add(eventId);
      }
      favoritesVersion += 1;
      update({ favorites });
      return !wasFavorite;
    },

    async saveEvent(draft, eventId) {
      const validation = validateEventDraft(draft, calendar);
      if (!validation.valid) {
        return { ok: false, errors: validation.errors };
      }

      const action = eventId === undefined ? "create events" : "update events";
      try {
        const event = eventId === undefined
          ? await repository.createEvent(draft)
          : await repository.updateEvent(eventId, draft);
        await refresh();
        return { ok: true, event };
      } catch (error) {
        logger.error("Failed to save event", error, { eventId });
        const message = describeApiError(error, action);
        update({ error: message });
        return { ok: false, errors: [message] };
      }
    },

    async deleteEvent(eventId) {
      try {
        await repository.deleteEvent(eventId);
      } catch (error) {
        logger.error("Failed to delete event", error, { eventId });
        update({ error: describeApiError(error, "delete events") });
        return false;
      }

      const favorites = new Set(state.favorites);
      favorites.delete(eventId);
      favoritesVersion += 1;
      update({
        events: state.events.filter((event) => event.id !== eventId),
        favorites,
      });
      return true;
    },

    clearError() {
      update({ error: null });
    },

    dispose() {
      disposed = true;
      listeners.clear();
    },
  };
}
