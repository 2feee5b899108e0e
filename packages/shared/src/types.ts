/**
 * Shared TypeScript types for the campus event feed.
 * Consolidates wire contracts, domain models, time-model results and service seams.
 */

// ============================================================================
// WIRE TYPES (REST COLLABORATOR)
// ============================================================================

export interface EventRecord {
  id: number;
  name: string;
  location: string;
  starts_at: string;
  ends_at: string | null;
  host: string | null;
  description: string | null;
  /** Comma-joined lowercase labels, e.g. "soccer,athletic" */
  tags: string;
  created_at: string | null;
  owner_id: number | null;
}

export interface EventRequestBody {
  name: string;
  starts_at: string;
  ends_at: string | null;
  location: string;
  description?: string;
  host?: string;
  tags: string;
}

export interface FavoriteRequestBody {
  event_id: number;
}

export interface AccessTokenResponse {
  access_token: string;
  token_type: string;
}

export interface GoogleAuthRequestBody {
  id_token: string;
}

export interface RegistrationRequestBody {
  email: string;
  name: string;
  password: string;
}

export interface UserRecord {
  id: number;
  email: string;
  name: string;
  created_at: string;
  is_host: boolean | null;
}

// ============================================================================
// DOMAIN TYPES
// ============================================================================

export interface Event {
  id: number;
  name: string;
  location: string;
  startsAt: string;
  endsAt: string | null;
  host: string | null;
  description: string | null;
  tags: string[];
  ownerId: number | null;
  createdAt: string | null;
}

export interface EventDraft {
  name: string;
  location: string;
  startsAt: string;
  endsAt?: string | null;
  host?: string | null;
  description?: string | null;
  tags: string[];
}

export interface User {
  id: number;
  email: string;
  name: string;
  createdAt: string;
  isHost: boolean;
}

export interface LoginCredentials {
  email: string;
  password: string;
}

export interface Registration extends LoginCredentials {
  name: string;
}

// ============================================================================
// TIME MODEL TYPES
// ============================================================================

export type ParsedInstant =
  | { kind: "parsed"; epochMs: number }
  | { kind: "unparsed"; raw: string };

export interface CalendarParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: string;
}

export interface LocalCalendar {
  readonly timeZone: string;
  partsOf(epochMs: number): CalendarParts;
  /** yyyymmdd as an integer, comparable across days */
  dayKey(epochMs: number): number;
}

export interface ParsedEventTiming {
  status: "parsed";
  normalizedStart: number;
  normalizedEnd: number | null;
  effectiveEnd: number;
  durationMs: number;
  startDayKey: number;
  endDayKey: number | null;
  isAllDay: boolean;
  isMultiDay: boolean;
  displayDateLabel: string;
  displayTimeLabel: string;
}

export interface UnparsedEventTiming {
  status: "unparsed";
  raw: string;
  isAllDay: false;
  isMultiDay: false;
  displayDateLabel: string;
  displayTimeLabel: string;
}

export type EventTiming = ParsedEventTiming | UnparsedEventTiming;

export interface EventTimeOptions {
  calendar?: LocalCalendar;
  /** Render "start - start+1h" when the event has no end */
  useDefaultEnd?: boolean;
}

// ============================================================================
// FEED TYPES
// ============================================================================

export interface CategoryRule {
  category: string;
  keywords: readonly string[];
}

export interface EventView {
  event: Event;
  category: string;
  timing: EventTiming;
  isFavorite: boolean;
  /** The signed-in user owns the event and may edit or delete it */
  canEdit: boolean;
}

export interface DateRange {
  from: Date;
  to: Date;
}

export interface FeedCriteria {
  /** "All" or an exact category name */
  category: string;
  query: string;
  range?: DateRange | null;
  /** Defaults to true */
  futureOnly?: boolean;
  /** Restrict to the user's favorites; defaults to false */
  favoritesOnly?: boolean;
  now: Date;
}

// ============================================================================
// SERVICE SEAMS
// ============================================================================

export interface EventsRepository {
  listEvents(): Promise<Event[]>;
  getEvent(id: number): Promise<Event>;
  createEvent(draft: EventDraft): Promise<Event>;
  updateEvent(id: number, draft: EventDraft): Promise<Event>;
  deleteEvent(id: number): Promise<void>;
  listFavorites(): Promise<Event[]>;
  addFavorite(eventId: number): Promise<void>;
  removeFavorite(eventId: number): Promise<void>;
}

export interface SessionProvider {
  getAccessToken(): string | null;
  isSignedIn(): boolean;
  getCurrentUser?(): User | null;
}

export type ApiErrorCode =
  | "network"
  | "timeout"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "validation"
  | "server"
  | "invalid_response"
  | "unknown";

// ============================================================================
// VALIDATION TYPES
// ============================================================================

export interface StringValidationOptions {
  minLength?: number;
  maxLength?: number;
  allowEmpty?: boolean;
  trim?: boolean;
  label?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// ============================================================================
// LOGGING TYPES
// ============================================================================

export interface LogMetadata {
  [key: string]: unknown;
}

export interface ErrorMetadata extends LogMetadata {
  error?: unknown;
}
