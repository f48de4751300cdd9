import { z } from "zod";
import { DEFAULT_CLASSIFIER_TIMEOUT_MS } from "./detector/classifier.js";

const EnvSchema = z.object({
  PRIVACY_LEDGER_DB_PATH: z.string().min(1).optional(),
  JOURNAL_PATH: z.string().min(1).optional(),
  PRIVACY_LEDGER_CLASSIFIER: z.enum(["ollama", "off"]).default("off"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("qwen2.5:3b"),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CLASSIFIER_TIMEOUT_MS),
});

export interface LedgerConfig {
  /** null when nothing was configured; the server then asks the MCP client for roots. */
  dbPath: string | null;
  classifier: {
    kind: "ollama" | "off";
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
}

export const DEFAULT_DB_PATH = "./data/privacy-ledger.sqlite";
export const DB_FILENAME = ".privacy-ledger.sqlite";

/**
 * Reads configuration from CLI arguments and the environment:
 * 1. first CLI argument, 2. PRIVACY_LEDGER_DB_PATH, 3. JOURNAL_PATH/.privacy-ledger.sqlite.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): LedgerConfig {
  const parsed = EnvSchema.parse(env);

  let dbPath: string | null = null;
  if (argv[0]) {
    dbPath = argv[0];
  } else if (parsed.PRIVACY_LEDGER_DB_PATH) {
    dbPath = parsed.PRIVACY_LEDGER_DB_PATH;
  } else if (parsed.JOURNAL_PATH) {
    dbPath = `${parsed.JOURNAL_PATH}/${DB_FILENAME}`;
  }

  return {
    dbPath,
    classifier: {
      kind: parsed.PRIVACY_LEDGER_CLASSIFIER,
      baseUrl: parsed.OLLAMA_BASE_URL,
      model: parsed.OLLAMA_MODEL,
      timeoutMs: parsed.CLASSIFIER_TIMEOUT_MS,
    },
  };
}
