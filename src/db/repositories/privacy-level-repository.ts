import type { Database as DatabaseType } from "better-sqlite3";
import type { EntityKind, PrivacyLevel } from "../../types.js";
import { withStorage } from "../../errors.js";
import { EventRepository } from "./event-repository.js";

// Stays under SQLite's bound-parameter limit, which is 999 on older builds.
const COUNT_CHUNK_SIZE = 500;

/**
 * Durable privacy levels keyed by `(entity_kind, entity_id)`. A missing row
 * means `public`; writes touch a single row.
 */
export class PrivacyLevelRepository {
  private events: EventRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
  }

  get(kind: EntityKind, entityId: string): PrivacyLevel {
    const row = this.db
      .prepare(`SELECT level FROM privacy_levels WHERE entity_kind = ? AND entity_id = ?`)
      .get(kind, entityId) as { level: PrivacyLevel } | undefined;
    return row?.level ?? "public";
  }

  set(kind: EntityKind, entityId: string, level: PrivacyLevel): void {
    withStorage("privacy level update", () => {
      const previous = this.get(kind, entityId);
      this.db
        .prepare(
          `INSERT INTO privacy_levels (entity_kind, entity_id, level, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT (entity_kind, entity_id) DO UPDATE SET level = excluded.level, updated_at = excluded.updated_at`,
        )
        .run(kind, entityId, level, new Date().toISOString());

      this.events.append("PRIVACY_LEVEL_SET", { entity_kind: kind, entity_id: entityId, from: previous, to: level });
    });
  }

  listPrivate(kind: EntityKind): string[] {
    return (
      this.db
        .prepare(`SELECT entity_id FROM privacy_levels WHERE entity_kind = ? AND level = 'private' ORDER BY updated_at ASC`)
        .all(kind) as { entity_id: string }[]
    ).map((row) => row.entity_id);
  }

  /** Distinct private entities among `entityIds`; duplicates count once. */
  countPrivate(kind: EntityKind, entityIds: string[]): number {
    const unique = [...new Set(entityIds)];
    if (unique.length === 0) return 0;

    return withStorage("privacy level count", () => {
      let count = 0;
      for (let i = 0; i < unique.length; i += COUNT_CHUNK_SIZE) {
        const chunk = unique.slice(i, i + COUNT_CHUNK_SIZE);
        const placeholders = chunk.map(() => "?").join(", ");
        const row = this.db
          .prepare(
            `SELECT COUNT(*) AS count FROM privacy_levels
             WHERE entity_kind = ? AND level = 'private' AND entity_id IN (${placeholders})`,
          )
          .get(kind, ...chunk) as { count: number };
        count += row.count;
      }
      return count;
    });
  }
}
