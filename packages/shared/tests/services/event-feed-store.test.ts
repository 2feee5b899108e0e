import { afterEach, describe, expect, it, vi } from "vitest";
import { createEventFeedStore } from "../../src/services/event-feed-store.ts";
import { ApiError } from "../../src/utils/api-error-util.ts";
import { createLocalCalendar } from "../../src/utils/local-calendar-util.ts";
import type {
  Event,
  EventDraft,
  EventsRepository,
  SessionProvider,
  User,
} from "../../src/types.ts";
import { makeLogger } from "./fake-api.ts";

const calendar = createLocalCalendar("UTC");
const now = () => new Date("2026-01-01T00:00:00Z");

const makeEvent = (id: number, overrides: Partial<Event> = {}): Event => ({
  id,
  name: `Event ${id}`,
  location: "Student Union",
  startsAt: `2026-01-${String(10 + id).padStart(2, "0")}T18:00:00Z`,
  endsAt: null,
  host: null,
  description: null,
  tags: [],
  ownerId: null,
  createdAt: null,
  ...overrides,
});

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const makeRepository = (events: Event[] = [], favorites: Event[] = []) => ({
  listEvents: vi.fn(async () => events),
  getEvent: vi.fn(async (id: number) => makeEvent(id)),
  createEvent: vi.fn(async (_draft: EventDraft) => makeEvent(20)),
  updateEvent: vi.fn(async (id: number, _draft: EventDraft) => makeEvent(id)),
  deleteEvent: vi.fn(async (_id: number) => {}),
  listFavorites: vi.fn(async () => favorites),
  addFavorite: vi.fn(async (_eventId: number) => {}),
  removeFavorite: vi.fn(async (_eventId: number) => {}),
}) satisfies EventsRepository;

const session = (signedIn: boolean): SessionProvider => ({
  getAccessToken: () => (signedIn ? "test-token" : null),
  isSignedIn: () => signedIn,
});

const setup = (
  repository: EventsRepository,
  signedIn = true,
) => {
  const logger = makeLogger();
  const store = createEventFeedStore({
    repository,
    session: session(signedIn),
    calendar,
    now,
    logger,
  });
  return { store, logger };
};

const visibleIds = (store: ReturnType<typeof setup>["store"]): number[] =>
  store.getState().visible.map((view) => view.event.id);

const validDraft: EventDraft = {
  name: "Open Mic",
  location: "Cafe",
  startsAt: "2026-02-01T19:00:00Z",
  tags: ["music"],
};

describe("event-feed-store refresh", () => {
  it("starts idle and empty", () => {
    const { store } = setup(makeRepository());

    expect(store.getState()).toMatchObject({
      status: "idle",
      events: [],
      visible: [],
      error: null,
    });
  });

  it("loads events and favorites into sorted views", async () => {
    const repository = makeRepository(
      [makeEvent(3), makeEvent(1), makeEvent(2)],
      [makeEvent(2)],
    );
    const { store } = setup(repository);

    await store.refresh();

    const state = store.getState();
    expect(state.status).toBe("ready");
    expect(visibleIds(store)).toEqual([1, 2, 3]);
    expect([...state.favorites]).toEqual([2]);
    expect(state.visible.map((view) => view.isFavorite)).toEqual([
      false,
      true,
      false,
    ]);
  });

  it("skips favorites when signed out", async () => {
    const repository = makeRepository([makeEvent(1)]);
    const { store } = setup(repository, false);

    await store.refresh();

    expect(repository.listFavorites).not.toHaveBeenCalled();
    expect(store.getState().favorites.size).toBe(0);
  });

  it("reports loading to subscribers before the result", async () => {
    const { store } = setup(makeRepository([makeEvent(1)]));
    const statuses: string[] = [];
    store.subscribe((state) => statuses.push(state.status));

    await store.refresh();

    expect(statuses).toEqual(["loading", "ready"]);
  });

  it("applies only the most recent refresh", async () => {
    const first = deferred<Event[]>();
    const second = deferred<Event[]>();
    const repository = makeRepository();
    repository.listEvents
      .mockImplementationOnce(() => first.promise)
      .mockImplementationOnce(() => second.promise);
    const { store } = setup(repository, false);

    const firstRefresh = store.refresh();
    const secondRefresh = store.refresh();
    second.resolve([makeEvent(2)]);
    await secondRefresh;
    first.resolve([makeEvent(1)]);
    await firstRefresh;

    expect(store.getState().status).toBe("ready");
    expect(visibleIds(store)).toEqual([2]);
  });

  it("ignores the failure of a superseded refresh", async () => {
    const first = deferred<Event[]>();
    const repository = makeRepository([makeEvent(2)]);
    repository.listEvents.mockImplementationOnce(() => first.promise);
    const { store } = setup(repository, false);

    const firstRefresh = store.refresh();
    await store.refresh();
    first.reject(new ApiError("network", "offline"));
    await firstRefresh;

    expect(store.getState()).toMatchObject({ status: "ready", error: null });
  });

  it("records a friendly error without rejecting", async () => {
    const repository = makeRepository();
    repository.listEvents.mockRejectedValueOnce(
      new ApiError("network", "Network error: Network Error"),
    );
    const { store, logger } = setup(repository);

    await expect(store.refresh()).resolves.toBeUndefined();

    expect(store.getState()).toMatchObject({
      status: "error",
      error: "No internet connection. Please check your network and try again.",
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("keeps the previous favorites when they fail to load", async () => {
    const repository = makeRepository([makeEvent(1)], [makeEvent(1)]);
    const { store, logger } = setup(repository);
    await store.refresh();

    repository.listFavorites.mockRejectedValueOnce(
      new ApiError("server", "down", { status: 503 }),
    );
    await store.refresh();

    expect(store.getState().status).toBe("ready");
    expect([...store.getState().favorites]).toEqual([1]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("event-feed-store filters", () => {
  it("re-filters when the filters change", async () => {
    const repository = makeRepository([
      makeEvent(1, { tags: ["soccer", "athletic"] }),
      makeEvent(2, { tags: ["music"], name: "Jazz Night" }),
      makeEvent(3, { tags: ["music"] }),
    ]);
    const { store } = setup(repository);
    await store.refresh();

    store.setFilters({ category: "Clubs" });
    expect(visibleIds(store)).toEqual([2, 3]);

    store.setFilters({ query: "jazz" });
    expect(visibleIds(store)).toEqual([2]);
    expect(store.getState().filters).toEqual({
      category: "Clubs",
      query: "jazz",
      range: null,
      futureOnly: true,
      favoritesOnly: false,
    });
  });

  it("limits the feed to a date range", async () => {
    const { store } = setup(
      makeRepository([makeEvent(1), makeEvent(2), makeEvent(3)]),
    );
    await store.refresh();

    store.setFilters({
      range: {
        from: new Date("2026-01-12T00:00:00Z"),
        to: new Date("2026-01-13T00:00:00Z"),
      },
    });

    expect(visibleIds(store)).toEqual([2, 3]);
  });

  it("narrows to favorites for the saved list", async () => {
    const repository = makeRepository(
      [makeEvent(1, { name: "Jazz Night" }), makeEvent(2), makeEvent(3)],
      [makeEvent(3), makeEvent(1)],
    );
    const { store } = setup(repository);
    await store.refresh();

    store.setFilters({ favoritesOnly: true });
    expect(visibleIds(store)).toEqual([1, 3]);

    store.setFilters({ query: "jazz" });
    expect(visibleIds(store)).toEqual([1]);
  });

  it("marks events the signed-in user owns as editable", async () => {
    const owner: User = {
      id: 2,
      email: "host@example.edu",
      name: "Club Host",
      createdAt: "2026-01-01T00:00:00Z",
      isHost: true,
    };
    const store = createEventFeedStore({
      repository: makeRepository([
        makeEvent(1, { ownerId: 2 }),
        makeEvent(2, { ownerId: 5 }),
      ]),
      session: { ...session(true), getCurrentUser: () => owner },
      calendar,
      now,
      logger: makeLogger(),
    });

    await store.refresh();

    expect(store.getState().visible.map((view) => view.canEdit)).toEqual([
      true,
      false,
    ]);
  });
});

describe("event-feed-store favorites", () => {
  it("toggles a favorite on and off", async () => {
    const repository = makeRepository([makeEvent(1)]);
    const { store } = setup(repository);
    await store.refresh();

    await expect(store.toggleFavorite(1)).resolves.toBe(true);
    expect(repository.addFavorite).toHaveBeenCalledWith(1);
    expect(store.getState().visible[0].isFavorite).toBe(true);

    await expect(store.toggleFavorite(1)).resolves.toBe(false);
    expect(repository.removeFavorite).toHaveBeenCalledWith(1);
    expect(store.getState().visible[0].isFavorite).toBe(false);
  });

  it("keeps a favorite toggled while a refresh is in flight", async () => {
    const pendingFavorites = deferred<Event[]>();
    const repository = makeRepository([makeEvent(1)]);
    repository.listFavorites.mockImplementationOnce(
      () => pendingFavorites.promise,
    );
    const { store } = setup(repository);

    const refresh = store.refresh();
    await expect(store.toggleFavorite(1)).resolves.toBe(true);
    pendingFavorites.resolve([]);
    await refresh;

    expect(store.getState().status).toBe("ready");
    expect([...store.getState().favorites]).toEqual([1]);
    expect(store.getState().visible[0].isFavorite).toBe(true);

    await store.refresh();
    expect(store.getState().favorites.size).toBe(0);
  });

  it("keeps the favorite unchanged and explains a failure", async () => {
    const repository = makeRepository([makeEvent(1)]);
    repository.addFavorite.mockRejectedValueOnce(
      new ApiError("unauthorized", "You must be logged in to save favorites"),
    );
    const { store } = setup(repository);
    await store.refresh();

    await expect(store.toggleFavorite(1)).resolves.toBe(false);

    expect(store.getState().favorites.has(1)).toBe(false);
    expect(store.getState().error).toBe(
      "You must be logged in to save favorites. Please log in and try again.",
    );

    store.clearError();
    expect(store.getState().error).toBeNull();
  });
});

describe("event-feed-store editing", () => {
  it("does not submit an invalid draft", async () => {
    const repository = makeRepository();
    const { store } = setup(repository);

    const result = await store.saveEvent({ ...validDraft, name: "" });

    expect(result).toEqual({
      ok: false,
      errors: ["Please enter an event name"],
    });
    expect(repository.createEvent).not.toHaveBeenCalled();
  });

  it("creates an event and refreshes the feed", async () => {
    const repository = makeRepository([makeEvent(1)]);
    const { store } = setup(repository);

    const result = await store.saveEvent(validDraft);

    expect(result).toEqual({ ok: true, event: makeEvent(20) });
    expect(repository.createEvent).toHaveBeenCalledWith(validDraft);
    expect(repository.listEvents).toHaveBeenCalledTimes(1);
    expect(store.getState().status).toBe("ready");
  });

  it("updates an existing event", async () => {
    const repository = makeRepository();
    const { store } = setup(repository);

    await store.saveEvent(validDraft, 7);

    expect(repository.updateEvent).toHaveBeenCalledWith(7, validDraft);
    expect(repository.createEvent).not.toHaveBeenCalled();
  });

  it("returns the service's message when saving fails", async () => {
    const repository = makeRepository();
    repository.createEvent.mockRejectedValueOnce(
      new ApiError("forbidden", "no"),
    );
    const { store } = setup(repository);

    expect(await store.saveEvent(validDraft)).toEqual({
      ok: false,
      errors: ["You don't have permission to create events."],
    });
  });

  it("removes a deleted event from the feed", async () => {
    const repository = makeRepository(
      [makeEvent(1), makeEvent(2)],
      [makeEvent(2)],
    );
    const { store } = setup(repository);
    await store.refresh();

    await expect(store.deleteEvent(2)).resolves.toBe(true);

    expect(visibleIds(store)).toEqual([1]);
    expect(store.getState().favorites.has(2)).toBe(false);
  });

  it("keeps the event when deletion fails", async () => {
    const repository = makeRepository([makeEvent(1)]);
    repository.deleteEvent.mockRejectedValueOnce(
      new ApiError("not_found", "gone", { status: 404 }),
    );
    const { store } = setup(repository);
    await store.refresh();

    await expect(store.deleteEvent(1)).resolves.toBe(false);

    expect(visibleIds(store)).toEqual([1]);
    expect(store.getState().error).toBe("That event no longer exists.");
  });
});

describe("event-feed-store lifecycle", () => {
  it("stops notifying after unsubscribe", async () => {
    const { store } = setup(makeRepository());
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    unsubscribe();
    await store.refresh();

    expect(listener).not.toHaveBeenCalled();
  });

  it("discards a pending refresh after dispose", async () => {
    const pending = deferred<Event[]>();
    const repository = makeRepository();
    repository.listEvents.mockImplementationOnce(() => pending.promise);
    const { store } = setup(repository, false);

    const refresh = store.refresh();
    store.dispose();
    pending.resolve([makeEvent(1)]);
    await refresh;

    expect(store.getState().status).toBe("loading");
    expect(store.getState().events).toEqual([]);

    await store.refresh();
    expect(repository.listEvents).toHaveBeenCalledTimes(1);
  });
});

describe("event-feed-store logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs through a component logger gated by the runtime config", async () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const quiet = createEventFeedStore({
      repository: makeRepository([makeEvent(1)]),
      calendar,
      now,
      runtime: { logDebug: false },
    });
    const verbose = createEventFeedStore({
      repository: makeRepository([makeEvent(1)]),
      calendar,
      now,
      runtime: { logDebug: true },
    });

    await quiet.refresh();
    expect(debugSpy).not.toHaveBeenCalled();

    await verbose.refresh();
    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(debugSpy.mock.calls[0][0]))).toMatchObject({
      severity: "DEBUG",
      message: "Feed refreshed",
      component: "event-feed-store",
      events: 1,
      visible: 1,
    });
  });
});
