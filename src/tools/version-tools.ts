import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { VersionRepository } from "../db/repositories/version-repository.js";
import { guarded, jsonResult } from "./shared.js";

export function registerVersionTools(server: McpServer, context: LedgerContext): void {
  function getRepo(): VersionRepository {
    return new VersionRepository(context.requireDb());
  }

  server.registerTool(
    "save_version",
    {
      description:
        "Append the full text of a document as a new version. Earlier versions are never modified. " +
        "Returns the new version number.",
      inputSchema: {
        document_id: z.string().min(1).describe("The document (session) id."),
        content: z.string().describe("The complete document text."),
        version_type: z
          .string()
          .min(1)
          .optional()
          .describe("Kind of save, e.g. raw, edited, polished. Defaults to 'edited'."),
      },
    },
    async ({ document_id, content, version_type }) =>
      guarded(() => {
        const versionNumber = getRepo().saveVersion(document_id, content, version_type ?? "edited");
        return jsonResult({ document_id, version_number: versionNumber });
      }),
  );

  server.registerTool(
    "get_versions",
    {
      description: "List all versions of a document, most recent first.",
      inputSchema: {
        document_id: z.string().min(1).describe("The document (session) id."),
        include_content: z.boolean().optional().describe("Include full content (default false)."),
      },
    },
    async ({ document_id, include_content }) =>
      guarded(() => {
        const versions = getRepo().getVersions(document_id);
        const summary = versions.map((v) => ({
          version_number: v.version_number,
          version_type: v.version_type,
          created_at: v.created_at,
          ...(include_content ? { content: v.content } : { length: v.content.length }),
        }));
        return jsonResult(summary);
      }),
  );

  server.registerTool(
    "get_latest_version",
    {
      description: "Get the most recent version of a document, or null if it has none.",
      inputSchema: {
        document_id: z.string().min(1).describe("The document (session) id."),
      },
    },
    async ({ document_id }) => guarded(() => jsonResult(getRepo().getLatestVersion(document_id))),
  );

  server.registerTool(
    "restore_version",
    {
      description:
        "Restore an earlier version by appending it as a new 'restored' version. History is kept intact.",
      inputSchema: {
        document_id: z.string().min(1).describe("The document (session) id."),
        version_number: z.number().int().min(1).describe("The version to restore."),
      },
    },
    async ({ document_id, version_number }) =>
      guarded(() => {
        const restored = getRepo().restore(document_id, version_number);
        return jsonResult({
          document_id,
          restored_from: version_number,
          version_number: restored.version_number,
          version_type: restored.version_type,
        });
      }),
  );
}
