import type { Database as DatabaseType } from "better-sqlite3";
import { PrivacyLevelRepository } from "../db/repositories/privacy-level-repository.js";
import { PrivacyTagRepository } from "../db/repositories/privacy-tag-repository.js";
import { VaultRepository } from "../db/repositories/vault-repository.js";
import { withStorage } from "../errors.js";
import type { EntityKind, PrivacyLevel, PublishReadiness, SessionId } from "../types.js";
import { hashPassword, verifyPassword } from "./password.js";

/**
 * Privacy levels, vault lock state and the publish gate.
 *
 * Levels and the password hash are durable; whether the vault is unlocked is
 * held by this instance only, so a fresh instance (a process restart) starts
 * locked whenever a password exists. Construct one per process and pass it
 * to whatever needs it.
 *
 * Unlock attempts are not throttled.
 */
export class PrivacyStateStore {
  private readonly levels: PrivacyLevelRepository;
  private readonly tags: PrivacyTagRepository;
  private readonly vault: VaultRepository;
  private unlocked = false;

  constructor(private readonly db: DatabaseType) {
    this.levels = new PrivacyLevelRepository(db);
    this.tags = new PrivacyTagRepository(db);
    this.vault = new VaultRepository(db);
  }

  // ---- Levels ----

  getLevel(kind: EntityKind, entityId: string): PrivacyLevel {
    return this.levels.get(kind, entityId);
  }

  setLevel(kind: EntityKind, entityId: string, level: PrivacyLevel): void {
    this.levels.set(kind, entityId, level);
  }

  /** All or nothing: a failed write leaves every listed entity at its previous level. */
  setLevels(kind: EntityKind, entityIds: string[], level: PrivacyLevel): void {
    withStorage("privacy level batch update", () =>
      this.db.transaction(() => {
        for (const entityId of entityIds) {
          this.levels.set(kind, entityId, level);
        }
      })(),
    );
  }

  getPrivateEntityIds(kind: EntityKind): string[] {
    return this.levels.listPrivate(kind);
  }

  getPrivateContentCount(): { cards: number; sessions: number } {
    return {
      cards: this.levels.listPrivate("card").length,
      sessions: this.levels.listPrivate("session").length,
    };
  }

  // ---- Gates ----

  canUseExternalAPI(kind: EntityKind, entityId: string): boolean {
    return this.getLevel(kind, entityId) === "public";
  }

  /** Every listed entity must be public; an empty list passes. */
  canUseExternalAPIForAll(kind: EntityKind, entityIds: string[]): boolean {
    return entityIds.every((entityId) => this.canUseExternalAPI(kind, entityId));
  }

  /**
   * Public, and for sessions also fully reviewed: a session with any
   * `unreviewed` privacy tag cannot be published.
   */
  canPublish(kind: EntityKind, entityId: string): boolean {
    if (this.getLevel(kind, entityId) !== "public") return false;
    if (kind === "session" && this.tags.countUnreviewed(entityId) > 0) return false;
    return true;
  }

  checkPublishReady(sessionId: SessionId, cardIds: string[]): PublishReadiness {
    const blockers: string[] = [];

    if (this.getLevel("session", sessionId) === "private") {
      blockers.push("Session is marked as private");
    }

    const privateCards = this.levels.countPrivate("card", cardIds);
    if (privateCards > 0) {
      blockers.push(`${privateCards} card(s) marked as private`);
    }

    if (this.hasPassword() && !this.unlocked) {
      blockers.push("Vault is locked - unlock to verify private content");
    }

    return { ready: blockers.length === 0, blockers };
  }

  // ---- Vault ----

  hasPassword(): boolean {
    return this.vault.getPasswordHash() !== null;
  }

  isVaultUnlocked(): boolean {
    return !this.hasPassword() || this.unlocked;
  }

  setPassword(password: string): boolean {
    if (password.length === 0) return false;

    this.vault.setPasswordHash(hashPassword(password));
    this.unlocked = true;
    return true;
  }

  unlockVault(password: string): boolean {
    const stored = this.vault.getPasswordHash();
    if (stored === null) {
      this.unlocked = true;
      return true;
    }

    if (!verifyPassword(password, stored)) return false;

    this.unlocked = true;
    this.vault.recordTransition("VAULT_UNLOCKED");
    return true;
  }

  lockVault(): void {
    this.unlocked = false;
    this.vault.recordTransition("VAULT_LOCKED");
  }
}
