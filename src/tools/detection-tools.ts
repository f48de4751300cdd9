import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { PrivacyTagRepository } from "../db/repositories/privacy-tag-repository.js";
import { classifyExternally, detect } from "../detector/index.js";
import { scanSession } from "../privacy/session-scanner.js";
import { guarded, jsonResult } from "./shared.js";

export function registerDetectionTools(server: McpServer, context: LedgerContext): void {
  server.registerTool(
    "scan_text",
    {
      description:
        "Detect sensitive spans in free text (PII patterns and private topics). Nothing is stored. " +
        "With use_classifier, the configured local language model adds its findings; if it is unavailable " +
        "the rule-based result is returned alone.",
      inputSchema: {
        text: z.string().describe("Text to scan."),
        dedup: z
          .enum(["start", "span"])
          .optional()
          .describe("'start' keeps one match per start offset (default); 'span' one per start/end pair."),
        use_classifier: z.boolean().optional().describe("Also ask the external classifier, if configured."),
      },
    },
    async ({ text, dedup, use_classifier }) => {
      const classifier = use_classifier ? context.classifier : null;
      const matches = await detect(text, {
        dedup,
        classifier: classifier ?? undefined,
        timeoutMs: context.classifierTimeoutMs,
      });

      return jsonResult({
        classifier_used: classifier !== null,
        matches,
      });
    },
  );

  server.registerTool(
    "classify_text",
    {
      description:
        "Ask only the configured local language model for sensitive spans. Returns an empty list when no " +
        "classifier is configured or it does not answer in time.",
      inputSchema: {
        text: z.string().describe("Text to classify."),
      },
    },
    async ({ text }) => {
      if (!context.classifier) {
        return jsonResult({ classifier: null, matches: [] });
      }
      const matches = await classifyExternally(text, context.classifier, { timeoutMs: context.classifierTimeoutMs });
      return jsonResult({ classifier: context.classifier.name, matches });
    },
  );

  server.registerTool(
    "scan_session",
    {
      description:
        "Scan a session transcript and persist each finding as an unreviewed privacy tag. " +
        "A session that already has tags is not rescanned; its existing tags are returned.",
      inputSchema: {
        session_id: z.string().min(1).describe("The session the transcript belongs to."),
        text: z.string().describe("The transcript text."),
      },
    },
    async ({ session_id, text }) =>
      guarded(() => {
        const tags = new PrivacyTagRepository(context.requireDb());
        const result = scanSession(tags, session_id, text);

        return jsonResult({
          session_id,
          created: result.created,
          unreviewed: tags.countUnreviewed(session_id),
          tags: result.tags,
        });
      }),
  );
}
