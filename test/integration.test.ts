import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { DatabaseManager } from "../src/db/database.js";
import { VersionRepository } from "../src/db/repositories/version-repository.js";
import { PrivacyTagRepository } from "../src/db/repositories/privacy-tag-repository.js";
import { SessionRepository } from "../src/db/repositories/session-repository.js";
import { CardRepository } from "../src/db/repositories/card-repository.js";
import { EventRepository } from "../src/db/repositories/event-repository.js";
import { PrivacyStateStore } from "../src/privacy/privacy-state-store.js";
import { scanSession } from "../src/privacy/session-scanner.js";
import { ReviewCommitter } from "../src/review/review-committer.js";
import { SentenceReview } from "../src/review/sentence-review.js";

describe("Integration: dictation journal workflow", () => {
  let dbm: DatabaseManager;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
  });

  afterEach(() => {
    dbm.close();
  });

  it("should carry a transcript from dictation to published cards", () => {
    // Step 1: Initialize database
    assert.equal(dbm.isInitialized(), false);
    dbm.initialize();
    assert.equal(dbm.isInitialized(), true);

    const db = dbm.connection;
    const versions = new VersionRepository(db);
    const tags = new PrivacyTagRepository(db);
    const cards = new CardRepository(db);
    const events = new EventRepository(db);
    const privacy = new PrivacyStateStore(db);
    const sessionId = "session-2026-10-19";

    // Step 2: Raw transcript arrives and is versioned
    const transcript =
      "Went for a long walk this morning. Email me at sam@example.org about the trip. " +
      "The doctor changed my medication again.";
    assert.equal(versions.saveVersion(sessionId, transcript, "raw"), 1);

    // Step 3: Sensitive spans are tagged once
    const scanned = scanSession(tags, sessionId, transcript);
    assert.equal(scanned.created, true);
    assert.deepEqual(
      scanned.tags.map((t) => [t.tag_type, transcript.slice(t.start_offset, t.end_offset)]),
      [
        ["Email", "sam@example.org"],
        ["Topic:Medical", "doctor"],
        ["Topic:Medical", "medication"],
      ],
    );
    assert.equal(scanSession(tags, sessionId, transcript).created, false);

    // Step 4: Session cannot be published while tags are unreviewed
    assert.equal(privacy.canPublish("session", sessionId), false);
    for (const tag of scanned.tags) {
      tags.updateStatus(tag.tag_id, tag.tag_type === "Email" ? "dismissed" : "accepted");
    }
    assert.equal(privacy.canPublish("session", sessionId), true);

    // Step 5: The user edits and then undoes the edit
    const edited = transcript.replace("a long walk", "a run");
    assert.equal(versions.saveVersion(sessionId, edited, "edited"), 2);
    const restored = versions.restore(sessionId, 1);
    assert.equal(restored.version_number, 3);
    assert.equal(new SessionRepository(db).getById(sessionId).current_content, transcript);

    // Step 6: Sentence review splits the transcript into cards
    const review = SentenceReview.open(sessionId, transcript);
    assert.equal(review.count, 3);
    review.classifyRight();
    review.classifyRight();
    review.classifyLeft();
    const committed = new ReviewCommitter(db).commit(review);
    assert.equal(committed.created.length, 3);
    assert.equal(committed.skipped, 0);

    const sessionCards = cards.listBySession(sessionId);
    assert.deepEqual(
      sessionCards.map((c) => c.pile),
      ["INBOX", "INBOX", "VAULT"],
    );

    // Step 7: Protect the vault and check what may leave the device
    privacy.setPassword("test-secret");
    privacy.lockVault();
    const cardIds = sessionCards.map((c) => c.card_id);
    assert.equal(privacy.canUseExternalAPIForAll("card", cardIds), false);
    assert.equal(privacy.canUseExternalAPIForAll("card", cardIds.slice(0, 2)), true);

    assert.deepEqual(privacy.checkPublishReady(sessionId, cardIds), {
      ready: false,
      blockers: ["1 card(s) marked as private", "Vault is locked - unlock to verify private content"],
    });

    // Step 8: Only the public cards are published
    assert.equal(privacy.unlockVault("test-secret"), true);
    assert.deepEqual(privacy.checkPublishReady(sessionId, cardIds.slice(0, 2)), { ready: true, blockers: [] });

    // Step 9: Audit trail covers every step
    assert.equal(events.count("DB_INITIALIZED"), 1);
    assert.equal(events.count("VERSION_SAVED"), 3);
    assert.equal(events.count("VERSION_RESTORED"), 1);
    assert.equal(events.count("PRIVACY_TAGS_CREATED"), 1);
    assert.equal(events.count("PRIVACY_TAG_REVIEWED"), 3);
    assert.equal(events.count("CARD_CREATED"), 3);
    assert.equal(events.count("PRIVACY_LEVEL_SET"), 1);
    assert.equal(events.count("REVIEW_COMMITTED"), 1);
    assert.equal(events.count("VAULT_PASSWORD_SET"), 1);
    assert.equal(events.count("VAULT_LOCKED"), 1);
    assert.equal(events.count("VAULT_UNLOCKED"), 1);
  });

  it("should remove everything about a deleted session", () => {
    dbm.initialize();
    const db = dbm.connection;
    const privacy = new PrivacyStateStore(db);

    new VersionRepository(db).saveVersion("session-a", "I owe £4,000 to the bank.", "raw");
    scanSession(new PrivacyTagRepository(db), "session-a", "I owe £4,000 to the bank.");
    const review = SentenceReview.open("session-a", "I owe £4,000 to the bank.");
    review.markAll("private");
    new ReviewCommitter(db).commit(review);
    privacy.setLevel("session", "session-a", "private");
    new VersionRepository(db).saveVersion("session-b", "Unrelated.", "raw");

    assert.deepEqual(privacy.getPrivateContentCount(), { cards: 1, sessions: 1 });
    assert.equal(new SessionRepository(db).delete("session-a"), true);
    assert.deepEqual(privacy.getPrivateContentCount(), { cards: 0, sessions: 0 });

    const versions = new VersionRepository(db);
    assert.deepEqual(versions.getVersions("session-a"), []);
    assert.equal(versions.getVersions("session-b").length, 1);
    assert.deepEqual(new PrivacyTagRepository(db).listBySession("session-a"), []);
  });
});
