import type { Database as DatabaseType } from "better-sqlite3";
import type { EventType, LedgerEvent, SessionId } from "../../types.js";

export interface EventFilter {
  event_type?: EventType;
  /** Matches events whose payload names the session as `session_id` or `document_id`. */
  session_id?: SessionId;
  since?: string;
}

/**
 * Append-only audit trail. Every consent-relevant change (levels, tag reviews,
 * vault transitions, versions) is recorded here; rows are never updated.
 * Payloads carry ids and counts, never content.
 */
export class EventRepository {
  constructor(private db: DatabaseType) {}

  append(eventType: EventType, payload: Record<string, unknown>): LedgerEvent {
    const event = {
      event_type: eventType,
      timestamp: new Date().toISOString(),
      payload: JSON.stringify(payload),
    };

    const { lastInsertRowid } = this.db
      .prepare(`INSERT INTO events (event_type, timestamp, payload) VALUES (@event_type, @timestamp, @payload)`)
      .run(event);

    return { event_id: Number(lastInsertRowid), ...event };
  }

  /** Oldest first. */
  query(filter: EventFilter & { limit?: number; offset?: number } = {}): LedgerEvent[] {
    const { clause, params } = whereClause(filter);
    return this.db
      .prepare(`SELECT * FROM events ${clause} ORDER BY event_id ASC LIMIT ? OFFSET ?`)
      .all(...params, filter.limit ?? 100, filter.offset ?? 0) as LedgerEvent[];
  }

  count(filter: EventType | EventFilter = {}): number {
    const { clause, params } = whereClause(typeof filter === "string" ? { event_type: filter } : filter);
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM events ${clause}`).get(...params) as { count: number };
    return row.count;
  }
}

function whereClause(filter: EventFilter): { clause: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filter.event_type) {
    conditions.push("event_type = ?");
    params.push(filter.event_type);
  }
  if (filter.session_id) {
    conditions.push("COALESCE(json_extract(payload, '$.session_id'), json_extract(payload, '$.document_id')) = ?");
    params.push(filter.session_id);
  }
  if (filter.since) {
    conditions.push("timestamp >= ?");
    params.push(filter.since);
  }

  return { clause: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "", params };
}
