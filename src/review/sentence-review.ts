import { fullScan } from "../detector/scanner.js";
import type { FullScanOptions } from "../detector/scanner.js";
import { InvalidParameterError } from "../errors.js";
import type { Match, SessionId } from "../types.js";
import { splitSentences } from "./sentences.js";

export type SentenceDecisionValue = "pending" | "public" | "private";

export interface SentenceDecision {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  matches: Match[];
  decision: SentenceDecisionValue;
}

export const REVIEW_ACTIONS = [
  "classify_right",
  "classify_left",
  "toggle",
  "mark_all_public",
  "mark_all_private",
  "previous",
  "next",
] as const;

export type ReviewAction = (typeof REVIEW_ACTIONS)[number];

export interface ReviewSummary {
  total: number;
  cursor: number;
  complete: boolean;
  pending: number;
  public: number;
  private: number;
}

/**
 * Sentence-by-sentence privacy review of one document.
 *
 * Every sentence starts `pending`. Classifying sets a decision and advances the
 * cursor; the review is complete once the cursor is past the last sentence.
 * A reviewed sentence never returns to `pending`.
 */
export class SentenceReview {
  private readonly units: SentenceDecision[];
  private position = 0;
  private committed = false;

  constructor(
    readonly sessionId: SessionId,
    units: SentenceDecision[],
  ) {
    this.units = units.map((unit) => ({ ...unit, matches: [...unit.matches] }));
  }

  static open(sessionId: SessionId, text: string, options: FullScanOptions = {}): SentenceReview {
    const units = splitSentences(text).map(
      (sentence, index): SentenceDecision => ({
        index,
        text: sentence.text,
        startOffset: sentence.startOffset,
        endOffset: sentence.endOffset,
        matches: fullScan(sentence.text, options),
        decision: "pending",
      }),
    );
    return new SentenceReview(sessionId, units);
  }

  get count(): number {
    return this.units.length;
  }

  get cursor(): number {
    return this.position;
  }

  get isComplete(): boolean {
    return this.position >= this.units.length;
  }

  get isCommitted(): boolean {
    return this.committed;
  }

  get current(): SentenceDecision | null {
    const unit = this.units[this.position];
    return unit ? { ...unit } : null;
  }

  get sentences(): readonly SentenceDecision[] {
    return this.units.map((unit) => ({ ...unit }));
  }

  get reviewedCount(): number {
    return this.units.filter((unit) => unit.decision !== "pending").length;
  }

  /** Swipe right: current sentence is public, move on. */
  classifyRight(): void {
    this.classifyCurrent("public");
  }

  /** Swipe left: current sentence is private, move on. */
  classifyLeft(): void {
    this.classifyCurrent("private");
  }

  swipe(direction: "left" | "right"): void {
    if (direction === "left") this.classifyLeft();
    else this.classifyRight();
  }

  /** `pending`/`public` become `private`, `private` becomes `public`. Cursor stays. */
  toggle(): void {
    this.assertOpen();
    const unit = this.units[this.position];
    if (!unit) return;
    unit.decision = unit.decision === "private" ? "public" : "private";
  }

  markAll(decision: "public" | "private"): void {
    this.assertOpen();
    for (const unit of this.units) {
      unit.decision = decision;
    }
    this.position = this.units.length;
  }

  previous(): void {
    if (this.position > 0) {
      this.position = Math.min(this.position - 1, this.units.length - 1);
    }
  }

  next(): void {
    if (this.position < this.units.length - 1) {
      this.position += 1;
    }
  }

  apply(action: ReviewAction): void {
    switch (action) {
      case "classify_right":
        return this.classifyRight();
      case "classify_left":
        return this.classifyLeft();
      case "toggle":
        return this.toggle();
      case "mark_all_public":
        return this.markAll("public");
      case "mark_all_private":
        return this.markAll("private");
      case "previous":
        return this.previous();
      case "next":
        return this.next();
    }
  }

  summary(): ReviewSummary {
    const counts = { pending: 0, public: 0, private: 0 };
    for (const unit of this.units) {
      counts[unit.decision] += 1;
    }
    return { total: this.units.length, cursor: this.position, complete: this.isComplete, ...counts };
  }

  /** Called by the committer; the review cannot change or be committed again. */
  close(): void {
    this.assertOpen();
    this.committed = true;
  }

  private classifyCurrent(decision: "public" | "private"): void {
    this.assertOpen();
    const unit = this.units[this.position];
    if (!unit) return;
    unit.decision = decision;
    this.position += 1;
  }

  private assertOpen(): void {
    if (this.committed) {
      throw new InvalidParameterError(`Review for session ${this.sessionId} has already been committed`);
    }
  }
}
