import type { Database as DatabaseType } from "better-sqlite3";
import type { DatabaseManager } from "./db/database.js";
import type { ExternalClassifier } from "./detector/classifier.js";
import { DatabaseNotInitializedError } from "./errors.js";
import { PrivacyStateStore } from "./privacy/privacy-state-store.js";
import { ReviewRegistry } from "./review/review-registry.js";
import type { ReviewRegistryOptions } from "./review/review-registry.js";

export interface LedgerContextOptions {
  classifier?: ExternalClassifier | null;
  classifierTimeoutMs?: number;
  reviews?: ReviewRegistryOptions;
}

/**
 * Process-lifetime state shared by the tools: the database handle, the single
 * privacy state store (which owns the vault's unlocked flag) and open reviews.
 */
export class LedgerContext {
  readonly reviews: ReviewRegistry;
  readonly classifier: ExternalClassifier | null;
  readonly classifierTimeoutMs: number | undefined;

  private store: { db: DatabaseType; privacy: PrivacyStateStore } | null = null;

  constructor(
    readonly dbManager: DatabaseManager,
    options: LedgerContextOptions = {},
  ) {
    this.classifier = options.classifier ?? null;
    this.classifierTimeoutMs = options.classifierTimeoutMs;
    this.reviews = new ReviewRegistry(options.reviews);
  }

  requireDb(): DatabaseType {
    if (!this.dbManager.isInitialized()) throw new DatabaseNotInitializedError();
    return this.dbManager.connection;
  }

  privacy(): PrivacyStateStore {
    const db = this.requireDb();
    if (!this.store || this.store.db !== db) {
      this.store = { db, privacy: new PrivacyStateStore(db) };
    }
    return this.store.privacy;
  }
}
