import type { Database as DatabaseType } from "better-sqlite3";
import { CardRepository } from "../db/repositories/card-repository.js";
import { EventRepository } from "../db/repositories/event-repository.js";
import { PrivacyLevelRepository } from "../db/repositories/privacy-level-repository.js";
import { InvalidParameterError, PrivacyLedgerError, StorageError, describeCause } from "../errors.js";
import type { CardId, PrivacyLevel } from "../types.js";
import { DEFAULT_CARD_TAG_TYPE } from "../types.js";
import type { SentenceReview } from "./sentence-review.js";

export interface CommittedCard {
  index: number;
  card_id: CardId;
  level: PrivacyLevel;
}

export interface CommitFailure {
  index: number;
  message: string;
}

export interface CommitResult {
  created: CommittedCard[];
  failed: CommitFailure[];
  /** Sentences still `pending`; they are never turned into cards. */
  skipped: number;
}

/**
 * Materializes review decisions into cards. Public sentences land in INBOX at
 * the default level; private ones land in VAULT with an explicit `private`
 * level written in the same transaction as the card. A sentence that fails is
 * reported and the rest are still attempted.
 */
export class ReviewCommitter {
  private cards: CardRepository;
  private levels: PrivacyLevelRepository;
  private events: EventRepository;

  constructor(private db: DatabaseType) {
    this.cards = new CardRepository(db);
    this.levels = new PrivacyLevelRepository(db);
    this.events = new EventRepository(db);
  }

  commit(review: SentenceReview, tagType: string = DEFAULT_CARD_TAG_TYPE): CommitResult {
    if (review.isCommitted) {
      throw new InvalidParameterError(`Review for session ${review.sessionId} has already been committed`);
    }

    const result: CommitResult = { created: [], failed: [], skipped: 0 };

    for (const unit of review.sentences) {
      if (unit.decision === "pending") {
        result.skipped += 1;
        continue;
      }

      const level: PrivacyLevel = unit.decision;
      try {
        const card = this.db.transaction(() => {
          const created = this.cards.create(review.sessionId, unit.text, level === "private" ? "VAULT" : "INBOX", tagType);
          if (level === "private") {
            this.levels.set("card", created.card_id, "private");
          }
          return created;
        })();
        result.created.push({ index: unit.index, card_id: card.card_id, level });
      } catch (err) {
        const error = err instanceof PrivacyLedgerError ? err : new StorageError("review commit", err);
        console.error(`[privacy-ledger] sentence ${unit.index} of session ${review.sessionId} not committed: ${error.message}`);
        result.failed.push({ index: unit.index, message: error.message });
      }
    }

    review.close();

    try {
      this.events.append("REVIEW_COMMITTED", {
        session_id: review.sessionId,
        created: result.created.length,
        failed: result.failed.length,
        skipped: result.skipped,
      });
    } catch (err) {
      // Cards above are already committed.
      console.error(`[privacy-ledger] review summary event not recorded: ${describeCause(err)}`);
    }

    return result;
  }
}
