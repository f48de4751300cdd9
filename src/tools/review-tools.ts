import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { REVIEW_ACTIONS } from "../review/sentence-review.js";
import type { SentenceReview } from "../review/sentence-review.js";
import { ReviewCommitter } from "../review/review-committer.js";
import { guarded, jsonResult } from "./shared.js";

function describeReview(reviewId: string, review: SentenceReview) {
  return {
    review_id: reviewId,
    session_id: review.sessionId,
    summary: review.summary(),
    current: review.current,
  };
}

export function registerReviewTools(server: McpServer, context: LedgerContext): void {
  server.registerTool(
    "review_start",
    {
      description:
        "Open a sentence-by-sentence privacy review of a transcript. Every sentence starts pending and " +
        "carries its detected sensitive spans.",
      inputSchema: {
        session_id: z.string().min(1),
        text: z.string().describe("The transcript to review."),
      },
    },
    async ({ session_id, text }) => {
      const { reviewId, review } = context.reviews.open(session_id, text);
      return jsonResult({ ...describeReview(reviewId, review), sentences: review.sentences });
    },
  );

  server.registerTool(
    "review_action",
    {
      description:
        "Apply a review action: classify_right (public, advance), classify_left (private, advance), toggle, " +
        "mark_all_public, mark_all_private, previous, next.",
      inputSchema: {
        review_id: z.string().min(1),
        action: z.enum(REVIEW_ACTIONS),
      },
    },
    async ({ review_id, action }) =>
      guarded(() => {
        const review = context.reviews.get(review_id);
        review.apply(action);
        return jsonResult(describeReview(review_id, review));
      }),
  );

  server.registerTool(
    "review_status",
    {
      description: "Show the decisions and cursor of an open review.",
      inputSchema: {
        review_id: z.string().min(1),
      },
    },
    async ({ review_id }) =>
      guarded(() => {
        const review = context.reviews.get(review_id);
        return jsonResult({ ...describeReview(review_id, review), sentences: review.sentences });
      }),
  );

  server.registerTool(
    "review_commit",
    {
      description:
        "Turn the review's decisions into cards: public sentences into public cards, private sentences into " +
        "private cards. Pending sentences are dropped. Reports how many cards were created and which failed.",
      inputSchema: {
        review_id: z.string().min(1),
        tag_type: z.string().min(1).optional().describe("Tag for the created cards (default brain_dump)."),
      },
    },
    async ({ review_id, tag_type }) =>
      guarded(() => {
        const review = context.reviews.get(review_id);
        const result = new ReviewCommitter(context.requireDb()).commit(review, tag_type);
        context.reviews.discard(review_id);
        return {
          ...jsonResult({ review_id, session_id: review.sessionId, ...result }),
          ...(result.failed.length > 0 ? { isError: true } : {}),
        };
      }),
  );

  server.registerTool(
    "review_discard",
    {
      description: "Drop an open review without creating any cards.",
      inputSchema: {
        review_id: z.string().min(1),
      },
    },
    async ({ review_id }) => jsonResult({ review_id, discarded: context.reviews.discard(review_id) }),
  );
}
