import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "./context.js";
import { registerDbTools } from "./tools/db-tools.js";
import { registerDetectionTools } from "./tools/detection-tools.js";
import { registerPrivacyTools } from "./tools/privacy-tools.js";
import { registerReviewTools } from "./tools/review-tools.js";
import { registerVaultTools } from "./tools/vault-tools.js";
import { registerVersionTools } from "./tools/version-tools.js";

export const SERVER_NAME = "privacy-ledger-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(context: LedgerContext, getDbPath: () => string): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: "Privacy Ledger",
    },
    {
      instructions: [
        "This server guards a dictation journal's private content and keeps every edit of a transcript.",
        "",
        "Typical workflow:",
        "1. Initialize the database with db_init (one-time setup).",
        "2. After transcription, call scan_session to tag sensitive spans, and save_version with version_type 'raw'.",
        "3. Save every edit with save_version; browse with get_versions and undo with restore_version.",
        "4. Review tags with list_privacy_tags / review_privacy_tag, or split the transcript into sentence",
        "   cards with review_start, review_action and review_commit.",
        "5. Before sending content anywhere, call can_use_external_api; before publishing, check_publish_ready.",
        "6. list_events shows the audit trail of level changes, reviews and vault transitions.",
        "",
        "Private content must never be sent to an external service or published.",
      ].join("\n"),
    },
  );

  registerDbTools(server, context, getDbPath);
  registerDetectionTools(server, context);
  registerVersionTools(server, context);
  registerPrivacyTools(server, context);
  registerVaultTools(server, context);
  registerReviewTools(server, context);

  return server;
}
