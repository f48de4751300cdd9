import { z } from "zod";
import { ClassifierUnavailableError, describeCause } from "../errors.js";
import type { ExternalClassifier } from "./classifier.js";

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

export interface OllamaClassifierConfig {
  model: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Local Ollama instance used as the external classifier. Only talks to
 * `POST /api/generate` with streaming disabled.
 */
export class OllamaClassifier implements ExternalClassifier {
  readonly name = "ollama";

  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OllamaClassifierConfig) {
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? fetch;
  }

  async generate(prompt: string, signal: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: { temperature: 0 },
        }),
        signal,
      });
    } catch (err) {
      if (signal.aborted) throw signal.reason;
      if (isConnectionRefused(err)) {
        throw new ClassifierUnavailableError("Ollama not running. Start with: ollama serve", err);
      }
      throw new ClassifierUnavailableError(describeCause(err), err);
    }

    if (!response.ok) {
      // Release the connection; the error body is not used.
      await response.body?.cancel();
      throw new ClassifierUnavailableError(`Ollama API error: ${response.status}`);
    }

    const parsed = GenerateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ClassifierUnavailableError("malformed response from Ollama");
    }
    return parsed.data.response;
  }
}

function isConnectionRefused(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.message.includes("ECONNREFUSED")) return true;
  const cause: unknown = err.cause;
  return cause instanceof Error && "code" in cause && cause.code === "ECONNREFUSED";
}
