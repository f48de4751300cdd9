import { PrivacyLedgerError } from "../errors.js";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/**
 * Domain errors become `isError` results the agent can read; anything else is
 * left to the SDK.
 */
export async function guarded(handler: () => ToolResult | Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await handler();
  } catch (err) {
    if (err instanceof PrivacyLedgerError) {
      return { isError: true, content: [{ type: "text", text: err.message }] };
    }
    throw err;
  }
}
