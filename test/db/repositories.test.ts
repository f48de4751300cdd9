import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { DatabaseManager } from "../../src/db/database.js";
import { SessionRepository } from "../../src/db/repositories/session-repository.js";
import { PrivacyTagRepository } from "../../src/db/repositories/privacy-tag-repository.js";
import { PrivacyLevelRepository } from "../../src/db/repositories/privacy-level-repository.js";
import { VaultRepository } from "../../src/db/repositories/vault-repository.js";
import { CardRepository } from "../../src/db/repositories/card-repository.js";
import { VersionRepository } from "../../src/db/repositories/version-repository.js";
import { EventRepository } from "../../src/db/repositories/event-repository.js";
import { EntityNotFoundError } from "../../src/errors.js";
import type { Match } from "../../src/types.js";

const MATCHES: Match[] = [
  { category: "Email", text: "bob@example.com", startOffset: 14, endOffset: 29 },
  { category: "SSN", text: "123-45-6789", startOffset: 41, endOffset: 52 },
  { category: "Topic:Medical", text: "doctor", startOffset: 60, endOffset: 66 },
];

describe("SessionRepository", () => {
  let dbm: DatabaseManager;
  let repo: SessionRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new SessionRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should create a session once", () => {
    const first = repo.ensure("session-001");
    const second = repo.ensure("session-001");
    assert.equal(first.session_id, "session-001");
    assert.equal(first.current_content, null);
    assert.equal(first.current_version, 0);
    assert.equal(second.created_at, first.created_at);
  });

  it("should throw EntityNotFoundError for a missing session", () => {
    assert.throws(() => repo.getById("nonexistent"), EntityNotFoundError);
  });

  it("should update the current-content projection", () => {
    repo.ensure("session-001");
    repo.updateProjection("session-001", "Latest text", 3);
    const session = repo.getById("session-001");
    assert.equal(session.current_content, "Latest text");
    assert.equal(session.current_version, 3);
  });

  it("should delete a session with its history, tags, cards and levels", () => {
    const db = dbm.connection;
    new VersionRepository(db).saveVersion("session-001", "Raw transcript", "raw");
    new PrivacyTagRepository(db).createForSession("session-001", MATCHES);
    const card = new CardRepository(db).create("session-001", "A private thought.", "VAULT");
    const levels = new PrivacyLevelRepository(db);
    levels.set("card", card.card_id, "private");
    levels.set("session", "session-001", "private");

    assert.equal(repo.delete("session-001"), true);

    const count = (table: string) =>
      (db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number }).count;
    assert.equal(count("sessions"), 0);
    assert.equal(count("versions"), 0);
    assert.equal(count("privacy_tags"), 0);
    assert.equal(count("cards"), 0);
    assert.equal(count("privacy_levels"), 0);

    const events = new EventRepository(db).query({ event_type: "SESSION_DELETED" });
    assert.equal(events.length, 1);
    assert.deepEqual(JSON.parse(events[0].payload), { session_id: "session-001", cards: 1 });
  });

  it("should return false when deleting an unknown session", () => {
    assert.equal(repo.delete("nonexistent"), false);
  });
});

describe("PrivacyTagRepository", () => {
  let dbm: DatabaseManager;
  let repo: PrivacyTagRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new PrivacyTagRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should persist matches as unreviewed tags", () => {
    const { tags, created } = repo.createForSession("session-001", MATCHES);
    assert.equal(created, true);
    assert.equal(tags.length, 3);
    assert.deepEqual(
      tags.map((t) => [t.tag_type, t.start_offset, t.end_offset, t.status]),
      [
        ["Email", 14, 29, "unreviewed"],
        ["SSN", 41, 52, "unreviewed"],
        ["Topic:Medical", 60, 66, "unreviewed"],
      ],
    );
    assert.equal(repo.countUnreviewed("session-001"), 3);
  });

  it("should not recreate tags for a session that already has them", () => {
    const first = repo.createForSession("session-001", MATCHES);
    repo.updateStatus(first.tags[0].tag_id, "accepted");

    const second = repo.createForSession("session-001", MATCHES.slice(0, 1));
    assert.equal(second.created, false);
    assert.equal(second.tags.length, 3);
    assert.equal(second.tags[0].status, "accepted");
    assert.equal(repo.listBySession("session-001").length, 3);
  });

  it("should report nothing created for an empty match list", () => {
    const { tags, created } = repo.createForSession("session-001", []);
    assert.equal(created, false);
    assert.equal(tags.length, 0);
  });

  it("should filter by status", () => {
    const { tags } = repo.createForSession("session-001", MATCHES);
    repo.updateStatus(tags[1].tag_id, "dismissed");

    assert.equal(repo.listBySession("session-001", "dismissed").length, 1);
    assert.equal(repo.listBySession("session-001", "unreviewed").length, 2);
    assert.equal(repo.countUnreviewed("session-001"), 2);
  });

  it("should throw EntityNotFoundError when reviewing an unknown tag", () => {
    assert.throws(() => repo.updateStatus("nonexistent", "accepted"), EntityNotFoundError);
  });

  it("should record tag creation and review events", () => {
    const { tags } = repo.createForSession("session-001", MATCHES);
    repo.updateStatus(tags[0].tag_id, "accepted");

    const events = new EventRepository(dbm.connection);
    const created = events.query({ event_type: "PRIVACY_TAGS_CREATED" });
    assert.equal(created.length, 1);
    assert.deepEqual(JSON.parse(created[0].payload), { session_id: "session-001", count: 3 });

    const reviewed = events.query({ event_type: "PRIVACY_TAG_REVIEWED" });
    assert.equal(reviewed.length, 1);
    assert.deepEqual(JSON.parse(reviewed[0].payload), {
      tag_id: tags[0].tag_id,
      session_id: "session-001",
      from: "unreviewed",
      to: "accepted",
    });
  });
});

describe("PrivacyLevelRepository", () => {
  let dbm: DatabaseManager;
  let repo: PrivacyLevelRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new PrivacyLevelRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should default to public", () => {
    assert.equal(repo.get("session", "never-set"), "public");
    assert.equal(repo.get("card", "never-set"), "public");
  });

  it("should keep session and card levels apart", () => {
    repo.set("session", "shared-id", "private");
    assert.equal(repo.get("session", "shared-id"), "private");
    assert.equal(repo.get("card", "shared-id"), "public");
  });

  it("should list and count private entities", () => {
    repo.set("card", "card-1", "private");
    repo.set("card", "card-2", "private");
    repo.set("card", "card-3", "public");
    repo.set("card", "card-2", "public");

    assert.deepEqual(repo.listPrivate("card"), ["card-1"]);
    assert.equal(repo.countPrivate("card", ["card-1", "card-2", "card-3", "card-4"]), 1);
    assert.equal(repo.countPrivate("card", []), 0);
  });

  it("should count private entities across a list longer than one query can bind", () => {
    for (const id of ["card-7", "card-12000", "card-39999"]) {
      repo.set("card", id, "private");
    }
    const ids = Array.from({ length: 40000 }, (_, i) => `card-${i}`);
    assert.equal(repo.countPrivate("card", ids), 3);
    assert.equal(repo.countPrivate("card", [...ids, "card-7", "card-7"]), 3);
  });

  it("should audit level changes", () => {
    repo.set("session", "session-001", "private");
    repo.set("session", "session-001", "public");

    const events = new EventRepository(dbm.connection).query({ event_type: "PRIVACY_LEVEL_SET" });
    assert.deepEqual(
      events.map((e) => JSON.parse(e.payload)),
      [
        { entity_kind: "session", entity_id: "session-001", from: "public", to: "private" },
        { entity_kind: "session", entity_id: "session-001", from: "private", to: "public" },
      ],
    );
  });
});

describe("VaultRepository", () => {
  let dbm: DatabaseManager;
  let repo: VaultRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new VaultRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should hold a single password hash", () => {
    assert.equal(repo.getPasswordHash(), null);
    repo.setPasswordHash("scrypt$aa$bb");
    repo.setPasswordHash("scrypt$cc$dd");
    assert.equal(repo.getPasswordHash(), "scrypt$cc$dd");

    const rows = (dbm.connection.prepare(`SELECT COUNT(*) AS count FROM vault`).get() as { count: number }).count;
    assert.equal(rows, 1);

    const events = new EventRepository(dbm.connection).query({ event_type: "VAULT_PASSWORD_SET" });
    assert.deepEqual(
      events.map((e) => JSON.parse(e.payload)),
      [{ replaced: false }, { replaced: true }],
    );
  });
});

describe("CardRepository", () => {
  let dbm: DatabaseManager;
  let repo: CardRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new CardRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should create cards with the default tag type", () => {
    const card = repo.create("session-001", "Buy a new notebook.", "INBOX");
    assert.equal(card.tag_type, "brain_dump");
    assert.equal(card.pile, "INBOX");
    assert.deepEqual(repo.getById(card.card_id), card);
  });

  it("should register the owning session", () => {
    repo.create("session-001", "Buy a new notebook.", "INBOX");
    assert.equal(new SessionRepository(dbm.connection).getById("session-001").session_id, "session-001");
  });

  it("should list cards in creation order", () => {
    const a = repo.create("session-001", "First.", "INBOX");
    const b = repo.create("session-001", "Second.", "VAULT");
    repo.create("session-002", "Elsewhere.", "INBOX");

    assert.deepEqual(
      repo.listBySession("session-001").map((c) => c.card_id),
      [a.card_id, b.card_id],
    );
  });

  it("should throw EntityNotFoundError for a missing card", () => {
    assert.throws(() => repo.getById("nonexistent"), EntityNotFoundError);
  });
});

describe("EventRepository", () => {
  let dbm: DatabaseManager;
  let repo: EventRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new EventRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should append and retrieve events", () => {
    repo.append("VERSION_SAVED", { document_id: "session-001", version_number: 1 });
    const events = repo.query({ event_type: "VERSION_SAVED" });
    assert.equal(events.length, 1);
    assert.equal(events[0].event_type, "VERSION_SAVED");
  });

  it("should count events", () => {
    repo.append("VAULT_LOCKED", {});
    repo.append("VAULT_LOCKED", {});
    assert.equal(repo.count("VAULT_LOCKED"), 2);
    // +1 for DB_INITIALIZED
    assert.equal(repo.count(), 3);
  });

  it("should filter by the session named in the payload", () => {
    repo.append("VERSION_SAVED", { document_id: "session-001", version_number: 1 });
    repo.append("PRIVACY_TAGS_CREATED", { session_id: "session-001", count: 2 });
    repo.append("VERSION_SAVED", { document_id: "session-002", version_number: 1 });

    assert.deepEqual(
      repo.query({ session_id: "session-001" }).map((e) => e.event_type),
      ["VERSION_SAVED", "PRIVACY_TAGS_CREATED"],
    );
    assert.equal(repo.count({ event_type: "VERSION_SAVED", session_id: "session-002" }), 1);
  });

  it("should paginate results", () => {
    for (let i = 0; i < 5; i++) {
      repo.append("CARD_CREATED", { card_id: `card-${i}` });
    }
    const page1 = repo.query({ limit: 2, offset: 0 });
    const page2 = repo.query({ limit: 2, offset: 2 });
    assert.equal(page1.length, 2);
    assert.equal(page2.length, 2);
    assert.equal(page1[0].event_type, "DB_INITIALIZED");
  });
});
