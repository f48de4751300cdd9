// ---- Identifiers ----

export type SessionId = string; // UUIDv7 from the transcription side
export type CardId = string; // UUIDv7
export type TagId = string; // UUIDv7
export type VersionId = string; // UUIDv7

// ---- Detection ----

export interface Match {
  category: string;
  text: string;
  startOffset: number;
  endOffset: number;
  /** Set when a classifier span could not be located and offsets fell back to 0. */
  lowConfidence?: true;
}

// ---- Privacy tags ----

export type PrivacyTagStatus = "unreviewed" | "accepted" | "dismissed";

export const PRIVACY_TAG_STATUSES = ["unreviewed", "accepted", "dismissed"] as const;

export interface PrivacyTag {
  tag_id: TagId;
  session_id: SessionId;
  start_offset: number;
  end_offset: number;
  status: PrivacyTagStatus;
  tag_type: string;
  created_at: string;
}

// ---- Privacy levels ----

export type PrivacyLevel = "private" | "public";
export type EntityKind = "session" | "card";

export const PRIVACY_LEVELS = ["private", "public"] as const;
export const ENTITY_KINDS = ["session", "card"] as const;

export interface PublishReadiness {
  ready: boolean;
  blockers: string[];
}

// ---- Sessions & versions ----

export interface Session {
  session_id: SessionId;
  created_at: string;
  current_content: string | null;
  current_version: number;
  updated_at: string;
}

export type VersionType = "raw" | "edited" | "polished" | "restored" | (string & {});

export interface Version {
  version_id: VersionId;
  document_id: SessionId;
  version_number: number;
  version_type: VersionType;
  content: string;
  created_at: string;
}

// ---- Cards ----

export type CardPile = "INBOX" | "VAULT";

export interface Card {
  card_id: CardId;
  session_id: SessionId;
  content: string;
  pile: CardPile;
  tag_type: string;
  created_at: string;
}

// ---- Events ----

export const EVENT_TYPES = [
  "DB_INITIALIZED",
  "SESSION_DELETED",
  "VERSION_SAVED",
  "VERSION_RESTORED",
  "PRIVACY_TAGS_CREATED",
  "PRIVACY_TAG_REVIEWED",
  "PRIVACY_LEVEL_SET",
  "VAULT_PASSWORD_SET",
  "VAULT_UNLOCKED",
  "VAULT_LOCKED",
  "CARD_CREATED",
  "REVIEW_COMMITTED",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export interface LedgerEvent {
  event_id: number;
  event_type: EventType;
  timestamp: string;
  payload: string; // JSON
}

// ---- Constants ----

export const DEFAULT_CARD_TAG_TYPE = "brain_dump";
