import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { PrivacyTagRepository } from "../db/repositories/privacy-tag-repository.js";
import { SessionRepository } from "../db/repositories/session-repository.js";
import { ENTITY_KINDS, PRIVACY_LEVELS, PRIVACY_TAG_STATUSES } from "../types.js";
import { guarded, jsonResult } from "./shared.js";

const entityKind = z.enum(ENTITY_KINDS).describe("Whether the id names a session or a card.");

export function registerPrivacyTools(server: McpServer, context: LedgerContext): void {
  server.registerTool(
    "set_privacy_level",
    {
      description:
        "Mark a session or card as private (never leaves the device) or public (may be published " +
        "and sent to external APIs). The change is recorded in the audit log.",
      inputSchema: {
        entity_kind: entityKind,
        entity_id: z.string().min(1),
        level: z.enum(PRIVACY_LEVELS),
      },
    },
    async ({ entity_kind, entity_id, level }) =>
      guarded(() => {
        context.privacy().setLevel(entity_kind, entity_id, level);
        return jsonResult({ entity_kind, entity_id, level });
      }),
  );

  server.registerTool(
    "get_privacy_level",
    {
      description:
        "Get the privacy level of a session or card (public when never set) and whether it may be " +
        "published or sent to an external API.",
      inputSchema: {
        entity_kind: entityKind,
        entity_id: z.string().min(1),
      },
    },
    async ({ entity_kind, entity_id }) =>
      guarded(() => {
        const privacy = context.privacy();
        return jsonResult({
          entity_kind,
          entity_id,
          level: privacy.getLevel(entity_kind, entity_id),
          can_use_external_api: privacy.canUseExternalAPI(entity_kind, entity_id),
          can_publish: privacy.canPublish(entity_kind, entity_id),
        });
      }),
  );

  server.registerTool(
    "can_use_external_api",
    {
      description:
        "Gate to call before sending content to any external service. True only if every listed entity is public.",
      inputSchema: {
        entity_kind: entityKind,
        entity_ids: z.array(z.string().min(1)).min(1),
      },
    },
    async ({ entity_kind, entity_ids }) =>
      guarded(() => {
        const privacy = context.privacy();
        const blocked = entity_ids.filter((id) => !privacy.canUseExternalAPI(entity_kind, id));
        return jsonResult({ allowed: blocked.length === 0, blocked });
      }),
  );

  server.registerTool(
    "check_publish_ready",
    {
      description:
        "Publish gate. Reports whether a session and its cards may be published, with the blocking reasons. " +
        "Read-only.",
      inputSchema: {
        session_id: z.string().min(1),
        card_ids: z.array(z.string().min(1)).optional().describe("Cards belonging to the session."),
      },
    },
    async ({ session_id, card_ids }) =>
      guarded(() => {
        const readiness = context.privacy().checkPublishReady(session_id, card_ids ?? []);
        const unreviewed = new PrivacyTagRepository(context.requireDb()).countUnreviewed(session_id);
        return jsonResult({ ...readiness, unreviewed_tags: unreviewed });
      }),
  );

  server.registerTool(
    "list_privacy_tags",
    {
      description: "List the privacy tags detected for a session, optionally filtered by review status.",
      inputSchema: {
        session_id: z.string().min(1),
        status: z.enum(PRIVACY_TAG_STATUSES).optional(),
      },
    },
    async ({ session_id, status }) =>
      guarded(() => jsonResult(new PrivacyTagRepository(context.requireDb()).listBySession(session_id, status))),
  );

  server.registerTool(
    "review_privacy_tag",
    {
      description: "Record the user's review of a detected span: accepted (it is sensitive) or dismissed.",
      inputSchema: {
        tag_id: z.string().min(1),
        status: z.enum(PRIVACY_TAG_STATUSES),
      },
    },
    async ({ tag_id, status }) =>
      guarded(() => {
        const tags = new PrivacyTagRepository(context.requireDb());
        const tag = tags.updateStatus(tag_id, status);
        return jsonResult({ tag, unreviewed: tags.countUnreviewed(tag.session_id) });
      }),
  );

  server.registerTool(
    "delete_session",
    {
      description:
        "Delete a session with its versions, privacy tags and cards, and clear their privacy levels. Irreversible.",
      inputSchema: {
        session_id: z.string().min(1),
      },
    },
    async ({ session_id }) =>
      guarded(() => {
        const deleted = new SessionRepository(context.requireDb()).delete(session_id);
        return jsonResult({ session_id, deleted });
      }),
  );
}
