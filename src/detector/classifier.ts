import type { Match } from "../types.js";
import { ClassifierUnavailableError, describeCause } from "../errors.js";

/**
 * A language model that answers a free-text prompt. Implementations must honour
 * `signal`; the caller also stops waiting once it aborts.
 */
export interface ExternalClassifier {
  readonly name: string;
  generate(prompt: string, signal: AbortSignal): Promise<string>;
}

export interface ClassifyOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_CLASSIFIER_TIMEOUT_MS = 60000;

export const CLASSIFIER_CATEGORIES = [
  "Name",
  "Address",
  "Phone",
  "Email",
  "SSN",
  "Credit Card",
  "Medical",
  "Financial",
  "Password",
  "Location",
] as const;

export function buildClassificationPrompt(text: string): string {
  return [
    "Analyze the following text and identify any private or sensitive information.",
    "",
    "For each piece of sensitive information found, output a line in this exact format:",
    "TYPE|MATCHED_TEXT",
    "",
    `Valid types are: ${CLASSIFIER_CATEGORIES.join(", ")}`,
    "",
    "If no sensitive information is found, respond with: NONE",
    "",
    "Text to analyze:",
    "---",
    text,
    "---",
    "",
    "Respond ONLY with the formatted lines or NONE, nothing else.",
  ].join("\n");
}

/**
 * Turns `TYPE|MATCHED_TEXT` lines into matches. `NONE`, blank lines and lines of
 * any other shape are ignored. Spans are located by exact search in `originalText`;
 * a span that cannot be found is kept at offset 0 and flagged `lowConfidence`.
 */
export function parseClassifierResponse(response: string, originalText: string): Match[] {
  const matches: Match[] = [];

  for (const rawLine of response.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.toUpperCase() === "NONE") continue;

    const parts = line.split("|");
    if (parts.length !== 2) continue;

    const category = parts[0].trim();
    const matchedText = parts[1].trim();
    if (category.length === 0 || matchedText.length === 0) continue;

    const start = originalText.indexOf(matchedText);
    if (start >= 0) {
      matches.push({
        category: `LLM:${category}`,
        text: matchedText,
        startOffset: start,
        endOffset: start + matchedText.length,
      });
      continue;
    }

    const end = Math.min(matchedText.length, originalText.length);
    if (end === 0) continue;
    matches.push({
      category: `LLM:${category}`,
      text: matchedText,
      startOffset: 0,
      endOffset: end,
      lowConfidence: true,
    });
  }

  return matches.sort((a, b) => a.startOffset - b.startOffset);
}

/**
 * Asks the external classifier for sensitive spans. Never throws: a timeout,
 * cancellation, transport failure or unusable answer is logged and yields `[]`.
 * The answer is parsed only once it is complete, so an aborted call contributes
 * nothing.
 */
export async function classifyExternally(
  text: string,
  classifier: ExternalClassifier,
  options: ClassifyOptions = {},
): Promise<Match[]> {
  if (text.trim().length === 0 || options.signal?.aborted) return [];

  const timeoutMs = options.timeoutMs ?? DEFAULT_CLASSIFIER_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new ClassifierUnavailableError(`timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  const onCancel = () => controller.abort(new ClassifierUnavailableError("request cancelled"));
  options.signal?.addEventListener("abort", onCancel, { once: true });

  try {
    const response = await Promise.race([
      classifier.generate(buildClassificationPrompt(text), controller.signal),
      rejectOnAbort(controller.signal),
    ]);
    return parseClassifierResponse(response, text);
  } catch (err) {
    console.error(`[privacy-ledger] classifier '${classifier.name}' failed, using rule-based results only: ${describeCause(err)}`);
    return [];
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCancel);
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
