import type { Database as DatabaseType } from "better-sqlite3";
import type { Session, SessionId } from "../../types.js";
import { EntityNotFoundError, withStorage } from "../../errors.js";
import { EventRepository } from "./event-repository.js";

export class SessionRepository {
  private events: EventRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
  }

  /** Creates the session row if it is missing; an existing row is left alone. */
  ensure(sessionId: SessionId): Session {
    return withStorage("session registration", () => {
      const existing = this.findById(sessionId);
      if (existing) return existing;

      const now = new Date().toISOString();
      this.db
        .prepare(
          `INSERT INTO sessions (session_id, created_at, current_content, current_version, updated_at)
           VALUES (?, ?, NULL, 0, ?)`,
        )
        .run(sessionId, now, now);

      return { session_id: sessionId, created_at: now, current_content: null, current_version: 0, updated_at: now };
    });
  }

  getById(sessionId: SessionId): Session {
    const row = this.findById(sessionId);
    if (!row) throw new EntityNotFoundError("Session", sessionId);
    return row;
  }

  findById(sessionId: SessionId): Session | null {
    const row = this.db.prepare(`SELECT * FROM sessions WHERE session_id = ?`).get(sessionId) as Session | undefined;
    return row ?? null;
  }

  /** Writes the denormalized current-content projection. History is untouched. */
  updateProjection(sessionId: SessionId, content: string, versionNumber: number): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO sessions (session_id, created_at, current_content, current_version, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (session_id) DO UPDATE SET
           current_content = excluded.current_content,
           current_version = excluded.current_version,
           updated_at      = excluded.updated_at`,
      )
      .run(sessionId, now, content, versionNumber, now);
  }

  /**
   * Deletes a session together with its versions, tags and cards (FK cascade)
   * and clears the privacy levels held for the session and its cards.
   */
  delete(sessionId: SessionId): boolean {
    return withStorage("session deletion", () =>
      this.db.transaction(() => {
        if (!this.findById(sessionId)) return false;

        const cardIds = (
          this.db.prepare(`SELECT card_id FROM cards WHERE session_id = ?`).all(sessionId) as { card_id: string }[]
        ).map((row) => row.card_id);

        const clearLevel = this.db.prepare(`DELETE FROM privacy_levels WHERE entity_kind = ? AND entity_id = ?`);
        clearLevel.run("session", sessionId);
        for (const cardId of cardIds) clearLevel.run("card", cardId);

        this.db.prepare(`DELETE FROM sessions WHERE session_id = ?`).run(sessionId);
        this.events.append("SESSION_DELETED", { session_id: sessionId, cards: cardIds.length });
        return true;
      })(),
    );
  }
}
