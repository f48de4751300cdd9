import { v7 as uuidv7 } from "uuid";
import type { FullScanOptions } from "../detector/scanner.js";
import { ReviewNotFoundError } from "../errors.js";
import type { SessionId } from "../types.js";
import { SentenceReview } from "./sentence-review.js";

export interface ReviewRegistryOptions {
  /** Idle time after which a review is dropped. Defaults to one hour. */
  ttlMs?: number;
  /** Open reviews kept at most; the least recently used is evicted first. Defaults to 100. */
  maxOpen?: number;
  now?: () => number;
}

interface Entry {
  review: SentenceReview;
  lastUsed: number;
}

const DEFAULT_TTL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_OPEN = 100;

/**
 * Open reviews by id, for callers that drive a review across several requests.
 *
 * Entries are kept in least-recently-used order: every `get` moves the entry
 * to the end of the map, so expired and evicted entries are always at the front.
 */
export class ReviewRegistry {
  private reviews = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly maxOpen: number;
  private readonly now: () => number;

  constructor(options: ReviewRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxOpen = Math.max(1, options.maxOpen ?? DEFAULT_MAX_OPEN);
    this.now = options.now ?? Date.now;
  }

  open(sessionId: SessionId, text: string, options: FullScanOptions = {}): { reviewId: string; review: SentenceReview } {
    this.pruneExpired();
    while (this.reviews.size >= this.maxOpen) {
      const oldest = this.reviews.keys().next();
      if (oldest.done) break;
      this.reviews.delete(oldest.value);
    }

    const reviewId = uuidv7();
    const review = SentenceReview.open(sessionId, text, options);
    this.reviews.set(reviewId, { review, lastUsed: this.now() });
    return { reviewId, review };
  }

  get(reviewId: string): SentenceReview {
    const entry = this.reviews.get(reviewId);
    if (!entry || this.isExpired(entry)) {
      this.reviews.delete(reviewId);
      throw new ReviewNotFoundError(reviewId);
    }
    this.reviews.delete(reviewId);
    entry.lastUsed = this.now();
    this.reviews.set(reviewId, entry);
    return entry.review;
  }

  discard(reviewId: string): boolean {
    return this.reviews.delete(reviewId);
  }

  get size(): number {
    this.pruneExpired();
    return this.reviews.size;
  }

  private isExpired(entry: Entry): boolean {
    return this.now() - entry.lastUsed >= this.ttlMs;
  }

  private pruneExpired(): void {
    for (const [reviewId, entry] of this.reviews) {
      if (!this.isExpired(entry)) break;
      this.reviews.delete(reviewId);
    }
  }
}
