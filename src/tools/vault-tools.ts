import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerContext } from "../context.js";
import { guarded, jsonResult } from "./shared.js";

export function registerVaultTools(server: McpServer, context: LedgerContext): void {
  server.registerTool(
    "vault_status",
    {
      description: "Whether a vault password is set and whether the vault is currently unlocked.",
    },
    async () =>
      guarded(() => {
        const privacy = context.privacy();
        return jsonResult({ has_password: privacy.hasPassword(), unlocked: privacy.isVaultUnlocked() });
      }),
  );

  server.registerTool(
    "set_vault_password",
    {
      description: "Set or change the vault password. The vault is unlocked afterwards.",
      inputSchema: {
        password: z.string().describe("The new password. Must not be empty."),
      },
    },
    async ({ password }) =>
      guarded(() => {
        const ok = context.privacy().setPassword(password);
        if (!ok) {
          return { isError: true, content: [{ type: "text", text: "Vault password must not be empty." }] };
        }
        return jsonResult({ has_password: true, unlocked: true });
      }),
  );

  server.registerTool(
    "unlock_vault",
    {
      description:
        "Unlock the vault so private content status can be verified. Succeeds without a check when no " +
        "password has been set.",
      inputSchema: {
        password: z.string(),
      },
    },
    async ({ password }) =>
      guarded(() => {
        const unlocked = context.privacy().unlockVault(password);
        return jsonResult({ unlocked });
      }),
  );

  server.registerTool(
    "lock_vault",
    {
      description: "Lock the vault. Publishing is blocked while a password-protected vault is locked.",
    },
    async () =>
      guarded(() => {
        const privacy = context.privacy();
        privacy.lockVault();
        return jsonResult({ unlocked: privacy.isVaultUnlocked() });
      }),
  );
}
