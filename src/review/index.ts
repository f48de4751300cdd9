export { SentenceReview, REVIEW_ACTIONS } from "./sentence-review.js";
export type { ReviewAction, ReviewSummary, SentenceDecision, SentenceDecisionValue } from "./sentence-review.js";
export { ReviewCommitter } from "./review-committer.js";
export type { CommitFailure, CommitResult, CommittedCard } from "./review-committer.js";
export { ReviewRegistry } from "./review-registry.js";
export { countWords, parseParagraphs, splitSentences } from "./sentences.js";
export type { ParsedParagraph, ParsedSentence } from "./sentences.js";
