import type { Database as DatabaseType } from "better-sqlite3";
import { v7 as uuidv7 } from "uuid";
import type { Card, CardId, CardPile, SessionId } from "../../types.js";
import { DEFAULT_CARD_TAG_TYPE } from "../../types.js";
import { EntityNotFoundError } from "../../errors.js";
import { EventRepository } from "./event-repository.js";
import { SessionRepository } from "./session-repository.js";

export class CardRepository {
  private events: EventRepository;
  private sessions: SessionRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
    this.sessions = new SessionRepository(db);
  }

  create(sessionId: SessionId, content: string, pile: CardPile, tagType: string = DEFAULT_CARD_TAG_TYPE): Card {
    this.sessions.ensure(sessionId);

    const card: Card = {
      card_id: uuidv7(),
      session_id: sessionId,
      content,
      pile,
      tag_type: tagType,
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO cards (card_id, session_id, content, pile, tag_type, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(card.card_id, sessionId, content, pile, tagType, card.created_at);

    this.events.append("CARD_CREATED", { card_id: card.card_id, session_id: sessionId, pile });

    return card;
  }

  getById(cardId: CardId): Card {
    const row = this.db.prepare(`SELECT * FROM cards WHERE card_id = ?`).get(cardId) as Card | undefined;
    if (!row) throw new EntityNotFoundError("Card", cardId);
    return row;
  }

  listBySession(sessionId: SessionId): Card[] {
    return this.db
      .prepare(`SELECT * FROM cards WHERE session_id = ? ORDER BY created_at ASC, card_id ASC`)
      .all(sessionId) as Card[];
  }
}
