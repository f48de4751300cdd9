import type { Match } from "../types.js";
import { compilePatterns, DEFAULT_PATTERNS } from "./patterns.js";
import type { CompiledPattern, PatternDefinition } from "./patterns.js";
import { PRIVATE_TOPICS, topicMatchers } from "./topics.js";
import type { TopicDictionary } from "./topics.js";

/**
 * How `fullScan` collapses matches after sorting:
 * - `start`: one match per start offset, first after sorting wins.
 * - `span`: one match per `(startOffset, endOffset)` pair.
 */
export type DedupStrategy = "start" | "span";

export interface ScanOptions {
  /** Extra patterns applied after the built-in table. */
  extraPatterns?: readonly PatternDefinition[];
}

export interface TopicScanOptions {
  topics?: TopicDictionary;
}

export interface FullScanOptions extends ScanOptions, TopicScanOptions {
  dedup?: DedupStrategy;
}

/** Regex pass over the PII table. Sorted by start offset; input is not modified. */
export function scan(text: string, options: ScanOptions = {}): Match[] {
  const patterns: readonly CompiledPattern[] = options.extraPatterns
    ? [...DEFAULT_PATTERNS, ...compilePatterns(options.extraPatterns)]
    : DEFAULT_PATTERNS;

  const matches: Match[] = [];
  for (const { category, regex } of patterns) {
    for (const result of text.matchAll(regex)) {
      const matched = result[0];
      if (result.index === undefined || matched.length === 0) continue;
      matches.push({
        category,
        text: matched,
        startOffset: result.index,
        endOffset: result.index + matched.length,
      });
    }
  }

  return sortByStart(matches);
}

/**
 * Keyword pass over the topic dictionaries. Every case-insensitive occurrence of
 * a keyword is reported as `Topic:<category>` with the original casing; when
 * several keywords start at the same offset the first in dictionary order wins.
 */
export function scanTopics(text: string, options: TopicScanOptions = {}): Match[] {
  const matches: Match[] = [];

  for (const { category, regex } of topicMatchers(options.topics ?? PRIVATE_TOPICS)) {
    for (const result of text.matchAll(regex)) {
      const matched = result[0];
      if (result.index === undefined || matched.length === 0) continue;
      matches.push({
        category: `Topic:${category}`,
        text: matched,
        startOffset: result.index,
        endOffset: result.index + matched.length,
      });
    }
  }

  return dedupeMatches(matches, "start");
}

/**
 * Pattern matches followed by topic matches, sorted by start offset and
 * deduplicated. With the default `start` strategy a pattern hit hides a topic
 * hit that begins at the same offset.
 */
export function fullScan(text: string, options: FullScanOptions = {}): Match[] {
  return dedupeMatches([...scan(text, options), ...scanTopics(text, options)], options.dedup ?? "start");
}

export function containsPrivateTopics(text: string, topics: TopicDictionary = PRIVATE_TOPICS): boolean {
  return scanTopics(text, { topics }).length > 0;
}

export function dedupeMatches(matches: readonly Match[], strategy: DedupStrategy = "start"): Match[] {
  const seen = new Set<string>();
  return sortByStart(matches).filter((match) => {
    const key = strategy === "span" ? `${match.startOffset}:${match.endOffset}` : String(match.startOffset);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function sortByStart(matches: readonly Match[]): Match[] {
  return [...matches].sort((a, b) => a.startOffset - b.startOffset);
}
