import type { Match } from "../types.js";
import { classifyExternally } from "./classifier.js";
import type { ClassifyOptions, ExternalClassifier } from "./classifier.js";
import { dedupeMatches, fullScan } from "./scanner.js";
import type { FullScanOptions } from "./scanner.js";

export * from "./scanner.js";
export * from "./classifier.js";
export { OllamaClassifier } from "./ollama-client.js";
export type { OllamaClassifierConfig } from "./ollama-client.js";
export { PII_PATTERNS } from "./patterns.js";
export type { PatternDefinition } from "./patterns.js";
export { PRIVATE_TOPICS, loadTopicDictionary } from "./topics.js";
export type { TopicDictionary } from "./topics.js";

export interface DetectOptions extends FullScanOptions, ClassifyOptions {
  classifier?: ExternalClassifier;
}

/**
 * Rule-based scan combined with whatever the classifier returns. The rule-based
 * part never waits on the classifier and is kept when the classifier fails.
 */
export async function detect(text: string, options: DetectOptions = {}): Promise<Match[]> {
  const ruleBased = fullScan(text, options);
  if (!options.classifier) return ruleBased;

  const external = await classifyExternally(text, options.classifier, {
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });
  return dedupeMatches([...ruleBased, ...external], options.dedup ?? "start");
}
