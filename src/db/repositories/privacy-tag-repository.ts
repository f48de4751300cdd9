import type { Database as DatabaseType } from "better-sqlite3";
import { v7 as uuidv7 } from "uuid";
import type { Match, PrivacyTag, PrivacyTagStatus, SessionId, TagId } from "../../types.js";
import { EntityNotFoundError, withStorage } from "../../errors.js";
import { EventRepository } from "./event-repository.js";
import { SessionRepository } from "./session-repository.js";

export class PrivacyTagRepository {
  private events: EventRepository;
  private sessions: SessionRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
    this.sessions = new SessionRepository(db);
  }

  /**
   * Persists `matches` as unreviewed tags, but only the first time a session is
   * tagged. If the session already has tags they are returned as they are.
   */
  createForSession(sessionId: SessionId, matches: Match[]): { tags: PrivacyTag[]; created: boolean } {
    return withStorage("privacy tag creation", () =>
      this.db
        .transaction(() => {
          const existing = this.listBySession(sessionId);
          if (existing.length > 0) {
            return { tags: existing, created: false };
          }

          this.sessions.ensure(sessionId);
          const now = new Date().toISOString();
          const insert = this.db.prepare(
            `INSERT INTO privacy_tags (tag_id, session_id, start_offset, end_offset, status, tag_type, created_at)
             VALUES (?, ?, ?, ?, 'unreviewed', ?, ?)`,
          );

          const tags = matches.map((match): PrivacyTag => {
            const tag: PrivacyTag = {
              tag_id: uuidv7(),
              session_id: sessionId,
              start_offset: match.startOffset,
              end_offset: match.endOffset,
              status: "unreviewed",
              tag_type: match.category,
              created_at: now,
            };
            insert.run(tag.tag_id, sessionId, tag.start_offset, tag.end_offset, tag.tag_type, now);
            return tag;
          });

          if (tags.length > 0) {
            this.events.append("PRIVACY_TAGS_CREATED", { session_id: sessionId, count: tags.length });
          }
          return { tags, created: tags.length > 0 };
        })
        .immediate(),
    );
  }

  getById(tagId: TagId): PrivacyTag {
    const row = this.db.prepare(`SELECT * FROM privacy_tags WHERE tag_id = ?`).get(tagId) as PrivacyTag | undefined;
    if (!row) throw new EntityNotFoundError("Privacy tag", tagId);
    return row;
  }

  listBySession(sessionId: SessionId, status?: PrivacyTagStatus): PrivacyTag[] {
    if (status) {
      return this.db
        .prepare(`SELECT * FROM privacy_tags WHERE session_id = ? AND status = ? ORDER BY start_offset ASC, created_at ASC`)
        .all(sessionId, status) as PrivacyTag[];
    }
    return this.db
      .prepare(`SELECT * FROM privacy_tags WHERE session_id = ? ORDER BY start_offset ASC, created_at ASC`)
      .all(sessionId) as PrivacyTag[];
  }

  countUnreviewed(sessionId: SessionId): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS count FROM privacy_tags WHERE session_id = ? AND status = 'unreviewed'`)
      .get(sessionId) as { count: number };
    return row.count;
  }

  updateStatus(tagId: TagId, status: PrivacyTagStatus): PrivacyTag {
    return withStorage("privacy tag review", () => {
      const tag = this.getById(tagId);

      this.db.prepare(`UPDATE privacy_tags SET status = ? WHERE tag_id = ?`).run(status, tagId);
      this.events.append("PRIVACY_TAG_REVIEWED", {
        tag_id: tagId,
        session_id: tag.session_id,
        from: tag.status,
        to: status,
      });

      return { ...tag, status };
    });
  }
}
