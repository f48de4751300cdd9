#!/usr/bin/env node

import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { DB_FILENAME, DEFAULT_DB_PATH, loadConfig } from "./config.js";
import { LedgerContext } from "./context.js";
import { DatabaseManager } from "./db/database.js";
import { OllamaClassifier } from "./detector/ollama-client.js";
import { createServer } from "./server.js";

/**
 * Derive the database path from the MCP client's first file:// root.
 */
async function resolveDbPathFromRoots(lowLevelServer: Server): Promise<string> {
  const capabilities = lowLevelServer.getClientCapabilities();
  if (!capabilities?.roots) {
    throw new Error(
      "No database path configured and the MCP client does not support roots.\n" +
      "Either set PRIVACY_LEDGER_DB_PATH or JOURNAL_PATH, or use an MCP client that provides roots.",
    );
  }

  const { roots } = await lowLevelServer.listRoots();
  const fileRoot = roots.find((r) => r.uri.startsWith("file://"));
  if (!fileRoot) {
    throw new Error(
      "No database path configured and no file:// roots found from the MCP client.\n" +
      "Set PRIVACY_LEDGER_DB_PATH or JOURNAL_PATH to configure the database location.",
    );
  }

  const rootPath = fileURLToPath(fileRoot.uri);
  console.error(`[privacy-ledger] using journal path from MCP roots: ${rootPath}`);
  return `${rootPath}/${DB_FILENAME}`;
}

const config = loadConfig();
const hasExplicitConfig = config.dbPath !== null;
// May be replaced once the client's roots are known.
const state = { dbPath: config.dbPath ?? DEFAULT_DB_PATH };

const dbManager = new DatabaseManager();
if (hasExplicitConfig && existsSync(state.dbPath)) {
  dbManager.open(state.dbPath);
}

const classifier =
  config.classifier.kind === "ollama"
    ? new OllamaClassifier({ model: config.classifier.model, baseUrl: config.classifier.baseUrl })
    : null;

const context = new LedgerContext(dbManager, { classifier, classifierTimeoutMs: config.classifier.timeoutMs });
const server = createServer(context, () => state.dbPath);

async function main(): Promise<void> {
  const transport = new StdioServerTransport();

  if (!hasExplicitConfig) {
    const lowLevelServer = server.server;

    await new Promise<void>((resolve, reject) => {
      lowLevelServer.oninitialized = async () => {
        try {
          state.dbPath = await resolveDbPathFromRoots(lowLevelServer);
          if (existsSync(state.dbPath)) {
            dbManager.open(state.dbPath);
          }
          resolve();
        } catch (err) {
          reject(err);
        }
      };

      server.connect(transport).catch(reject);
    });
  } else {
    await server.connect(transport);
  }

  console.error(
    `[privacy-ledger] running (db: ${state.dbPath}, classifier: ${classifier ? classifier.name : "off"})`,
  );
}

main().catch((err) => {
  console.error("[privacy-ledger] fatal error:", err);
  process.exit(1);
});
