import { DEFAULT_CATEGORY_RULES } from "../config/category-config.ts";
import { FEED_DEFAULTS } from "../config/feed-config.ts";
import type {
  CategoryRule,
  DateRange,
  Event,
  EventTimeOptions,
  EventView,
  FeedCriteria,
  LocalCalendar,
} from "../types.ts";
import { deriveCategory } from "./event-category-util.ts";
import { deriveEventTiming } from "./event-time-util.ts";
import { createLocalCalendar } from "./local-calendar-util.ts";

export interface EventViewOptions extends EventTimeOptions {
  favorites?: ReadonlySet<number>;
  categoryRules?: readonly CategoryRule[];
  /** Id of the signed-in user, if any */
  currentUserId?: number | null;
}

export interface FilterOptions {
  calendar?: LocalCalendar;
}

/**
 * Pair each event with its derived category and timing, plus the viewer's
 * favorite and ownership flags.
 */
export function buildEventViews(
  events: readonly Event[],
  options: EventViewOptions = {},
): EventView[] {
  const calendar = options.calendar ?? createLocalCalendar();
  const rules = options.categoryRules ?? DEFAULT_CATEGORY_RULES;
  const userId = options.currentUserId ?? null;

  return events.map((event) => ({
    event,
    category: deriveCategory(event.tags, rules),
    timing: deriveEventTiming(event.startsAt, event.endsAt, {
      calendar,
      useDefaultEnd: options.useDefaultEnd,
    }),
    isFavorite: options.favorites?.has(event.id) ?? false,
    canEdit: userId !== null && event.ownerId === userId,
  }));
}

export function isInvalidDateRange(
  range: DateRange | null | undefined,
  calendar: LocalCalendar = createLocalCalendar(),
): boolean {
  if (!range) return false;
  return calendar.dayKey(range.to.getTime()) <
    calendar.dayKey(range.from.getTime());
}

function matchesQuery(view: EventView, needle: string): boolean {
  const { name, description, location } = view.event;
  return name.toLowerCase().includes(needle) ||
    (description ?? "").toLowerCase().includes(needle) ||
    location.toLowerCase().includes(needle);
}

/**
 * Narrow and order events for display. Stages run in a fixed order:
 * optional favorites scope, category, text, future-only, optional date range,
 * then a stable sort by start with unparsed events last. Pure given the same
 * criteria and `now`.
 */
export function filterEvents(
  views: readonly EventView[],
  criteria: FeedCriteria,
  options: FilterOptions = {},
): EventView[] {
  const calendar = options.calendar ?? createLocalCalendar();

  // Step 1: favorites scope
  let result = criteria.favoritesOnly
    ? views.filter((view) => view.isFavorite)
    : [...views];

  // Step 2: category
  if (criteria.category !== FEED_DEFAULTS.ALL_CATEGORIES) {
    result = result.filter((view) => view.category === criteria.category);
  }

  // Step 3: text
  const needle = criteria.query.trim().toLowerCase();
  if (needle) {
    result = result.filter((view) => matchesQuery(view, needle));
  }

  // Step 4: drop events whose last local day is already behind us
  if (criteria.futureOnly ?? FEED_DEFAULTS.FUTURE_ONLY) {
    const todayKey = calendar.dayKey(criteria.now.getTime());
    result = result.filter(({ timing }) => {
      if (timing.status === "unparsed") return true;
      const lastDayKey = timing.endDayKey ?? timing.startDayKey;
      return lastDayKey >= todayKey;
    });
  }

  // Step 5: inclusive local-day window on the start
  if (criteria.range) {
    const fromKey = calendar.dayKey(criteria.range.from.getTime());
    const toKey = calendar.dayKey(criteria.range.to.getTime());
    result = result.filter(({ timing }) =>
      timing.status === "parsed" &&
      timing.startDayKey >= fromKey &&
      timing.startDayKey <= toKey
    );
  }

  // Step 6: Array.prototype.sort is stable, so ties keep input order
  return result.sort((a, b) => {
    const left = a.timing;
    const right = b.timing;
    if (left.status === "unparsed") {
      return right.status === "unparsed" ? 0 : 1;
    }
    if (right.status === "unparsed") return -1;
    return left.normalizedStart - right.normalizedStart;
  });
}
