import type {
  Event,
  EventDraft,
  EventRecord,
  EventRequestBody,
  User,
  UserRecord,
} from "../types.ts";
import { joinTags, splitTags } from "./event-category-util.ts";

/**
 * Normalize an API event record into the client's Event model.
 * @param record - Event record as returned by the REST API
 * @returns Event with camelCase fields and tags split into a list
 */
export function normalizeEvent(record: EventRecord): Event {
  return {
    id: record.id,
    name: record.name,
    location: record.location,
    startsAt: record.starts_at,
    endsAt: record.ends_at || null,
    host: record.host || null,
    description: record.description || null,
    tags: splitTags(record.tags),
    ownerId: record.owner_id,
    createdAt: record.created_at,
  };
}

/**
 * Build the create/update request body. Tags are sent as one comma-joined
 * lowercase string; blank optional fields are left out.
 */
export function toEventRequestBody(draft: EventDraft): EventRequestBody {
  const body: EventRequestBody = {
    name: draft.name.trim(),
    starts_at: draft.startsAt,
    ends_at: draft.endsAt || null,
    location: draft.location.trim(),
    tags: joinTags(draft.tags),
  };

  const description = draft.description?.trim();
  if (description) {
    body.description = description;
  }

  const host = draft.host?.trim();
  if (host) {
    body.host = host;
  }

  return body;
}

export function normalizeUser(record: UserRecord): User {
  return {
    id: record.id,
    email: record.email,
    name: record.name,
    createdAt: record.created_at,
    isHost: record.is_host ?? false,
  };
}
