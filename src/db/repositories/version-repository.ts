import type { Database as DatabaseType } from "better-sqlite3";
import { v7 as uuidv7 } from "uuid";
import type { SessionId, Version, VersionType } from "../../types.js";
import { InvalidParameterError, VersionNotFoundError, withStorage } from "../../errors.js";
import { EventRepository } from "./event-repository.js";
import { SessionRepository } from "./session-repository.js";

/**
 * The version ledger: an append-only history of full-document saves keyed by
 * `(document_id, version_number)`.
 *
 * Allocation of the next number and the insert run inside one IMMEDIATE
 * transaction, so SQLite's write lock serializes concurrent savers of the same
 * document (also across processes) and the UNIQUE constraint rejects any
 * duplicate that slips past. Every save also refreshes the session's
 * current-content projection in the same transaction.
 */
export class VersionRepository {
  private events: EventRepository;
  private sessions: SessionRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
    this.sessions = new SessionRepository(db);
  }

  saveVersion(documentId: SessionId, content: string, versionType: VersionType): number {
    if (versionType.trim().length === 0) {
      throw new InvalidParameterError("versionType must be a non-empty string");
    }

    return withStorage("version save", () =>
      this.db.transaction(() => this.append(documentId, content, versionType)).immediate().version_number,
    );
  }

  getNextVersionNumber(documentId: SessionId): number {
    const row = this.db
      .prepare(`SELECT COALESCE(MAX(version_number), 0) + 1 AS next FROM versions WHERE document_id = ?`)
      .get(documentId) as { next: number };
    return row.next;
  }

  /** Most recent first. */
  getVersions(documentId: SessionId): Version[] {
    return this.db
      .prepare(`SELECT * FROM versions WHERE document_id = ? ORDER BY version_number DESC`)
      .all(documentId) as Version[];
  }

  getLatestVersion(documentId: SessionId): Version | null {
    const row = this.db
      .prepare(`SELECT * FROM versions WHERE document_id = ? ORDER BY version_number DESC LIMIT 1`)
      .get(documentId) as Version | undefined;
    return row ?? null;
  }

  getVersion(documentId: SessionId, versionNumber: number): Version {
    const row = this.findVersion(documentId, versionNumber);
    if (!row) throw new VersionNotFoundError(documentId, versionNumber);
    return row;
  }

  /**
   * Appends a new `restored` version carrying the content of `versionNumber`.
   * Existing versions are never rewritten.
   */
  restore(documentId: SessionId, versionNumber: number): Version {
    return withStorage("version restore", () =>
      this.db
        .transaction(() => {
          const source = this.findVersion(documentId, versionNumber);
          if (!source) throw new VersionNotFoundError(documentId, versionNumber);

          const restored = this.append(documentId, source.content, "restored");
          this.events.append("VERSION_RESTORED", {
            document_id: documentId,
            restored_from: versionNumber,
            version_number: restored.version_number,
          });
          return restored;
        })
        .immediate(),
    );
  }

  private findVersion(documentId: SessionId, versionNumber: number): Version | null {
    const row = this.db
      .prepare(`SELECT * FROM versions WHERE document_id = ? AND version_number = ?`)
      .get(documentId, versionNumber) as Version | undefined;
    return row ?? null;
  }

  // Callers hold the write transaction.
  private append(documentId: SessionId, content: string, versionType: VersionType): Version {
    const next = this.getNextVersionNumber(documentId);
    const now = new Date().toISOString();
    const version: Version = {
      version_id: uuidv7(),
      document_id: documentId,
      version_number: next,
      version_type: versionType,
      content,
      created_at: now,
    };

    this.sessions.updateProjection(documentId, content, next);
    this.db
      .prepare(
        `INSERT INTO versions (version_id, document_id, version_number, version_type, content, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(version.version_id, documentId, next, versionType, content, now);

    this.events.append("VERSION_SAVED", {
      document_id: documentId,
      version_number: next,
      version_type: versionType,
    });

    return version;
  }
}
