import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { EventRepository } from "../db/repositories/event-repository.js";
import { DatabaseAlreadyInitializedError, describeCause } from "../errors.js";
import { EVENT_TYPES } from "../types.js";
import { guarded, jsonResult } from "./shared.js";

const COUNTED_TABLES = ["sessions", "versions", "privacy_tags", "cards", "events"] as const;

export function registerDbTools(server: McpServer, context: LedgerContext, getDbPath: () => string): void {
  const { dbManager } = context;

  server.registerTool(
    "db_status",
    {
      description:
        "Check the ledger database status. Returns whether the DB is initialized, row counts and private entity counts.",
    },
    async () => {
      const path = dbManager.isOpen ? dbManager.connection.name : getDbPath();
      if (!dbManager.isInitialized()) {
        return jsonResult({ initialized: false, path });
      }

      const db = dbManager.connection;
      const stats: Record<string, number> = {};
      for (const table of COUNTED_TABLES) {
        stats[table] = (db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number }).count;
      }

      const privacy = context.privacy();
      return jsonResult({
        initialized: true,
        path,
        stats,
        private_content: privacy.getPrivateContentCount(),
        vault: { has_password: privacy.hasPassword(), unlocked: privacy.isVaultUnlocked() },
      });
    },
  );

  server.registerTool(
    "list_events",
    {
      description:
        "Read the audit trail: level changes, tag reviews, vault transitions, saved versions and created cards. " +
        "Oldest first. Payloads hold ids and counts, never content.",
      inputSchema: {
        event_type: z.enum(EVENT_TYPES).optional(),
        session_id: z.string().min(1).optional().describe("Only events about this session/document."),
        since: z.string().optional().describe("ISO timestamp; only events at or after it."),
        limit: z.number().int().min(1).max(1000).optional(),
        offset: z.number().int().min(0).optional(),
      },
    },
    async (filter) =>
      guarded(() => {
        const events = new EventRepository(context.requireDb()).query(filter);
        return jsonResult(events.map((event) => ({ ...event, payload: JSON.parse(event.payload) })));
      }),
  );

  server.registerTool(
    "db_init",
    {
      description:
        "Initialize the ledger database. Creates the SQLite file and all tables. Fails if already initialized.",
      inputSchema: {
        path: z.string().optional().describe("Database file path. Uses the configured default if omitted."),
      },
    },
    async ({ path: overridePath }) =>
      guarded(() => {
        if (dbManager.isInitialized()) {
          throw new DatabaseAlreadyInitializedError();
        }

        // An open but empty file is the default target unless another path is asked for.
        const openPath = dbManager.isOpen ? dbManager.connection.name : null;
        const targetPath = overridePath ?? openPath ?? getDbPath();

        try {
          if (openPath !== targetPath) {
            dbManager.close();
            dbManager.open(targetPath);
          }
          dbManager.initialize();
        } catch (err) {
          return {
            isError: true,
            content: [{ type: "text", text: `Failed to initialize database: ${describeCause(err)}` }],
          };
        }

        return jsonResult({
          initialized: true,
          path: dbManager.connection.name,
          message: "Ledger database created successfully.",
        });
      }),
  );
}
