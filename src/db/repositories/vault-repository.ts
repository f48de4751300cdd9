import type { Database as DatabaseType } from "better-sqlite3";
import { withStorage } from "../../errors.js";
import { EventRepository } from "./event-repository.js";

/** Single-row store for the vault password hash. */
export class VaultRepository {
  private events: EventRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
  }

  getPasswordHash(): string | null {
    const row = this.db.prepare(`SELECT password_hash FROM vault WHERE id = 1`).get() as
      | { password_hash: string }
      | undefined;
    return row?.password_hash ?? null;
  }

  setPasswordHash(hash: string): void {
    withStorage("vault password update", () => {
      const replaced = this.getPasswordHash() !== null;
      this.db
        .prepare(
          `INSERT INTO vault (id, password_hash, updated_at) VALUES (1, ?, ?)
           ON CONFLICT (id) DO UPDATE SET password_hash = excluded.password_hash, updated_at = excluded.updated_at`,
        )
        .run(hash, new Date().toISOString());

      this.events.append("VAULT_PASSWORD_SET", { replaced });
    });
  }

  recordTransition(eventType: "VAULT_UNLOCKED" | "VAULT_LOCKED"): void {
    withStorage("vault audit", () => {
      this.events.append(eventType, {});
    });
  }
}
