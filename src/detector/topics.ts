import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const TopicDictionarySchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

/** Topic category → lower-case keywords. */
export type TopicDictionary = z.infer<typeof TopicDictionarySchema>;

export const TOPIC_KEYWORDS_PATH = fileURLToPath(new URL("../../data/topic-keywords.json", import.meta.url));

export function loadTopicDictionary(path: string = TOPIC_KEYWORDS_PATH): TopicDictionary {
  return TopicDictionarySchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

export const PRIVATE_TOPICS: TopicDictionary = loadTopicDictionary();

export interface TopicMatcher {
  category: string;
  keyword: string;
  regex: RegExp;
}

const matcherCache = new WeakMap<TopicDictionary, TopicMatcher[]>();

export function topicMatchers(dictionary: TopicDictionary): TopicMatcher[] {
  const cached = matcherCache.get(dictionary);
  if (cached) return cached;

  const matchers = Object.entries(dictionary).flatMap(([category, keywords]) =>
    keywords.map((keyword) => ({
      category,
      keyword,
      regex: new RegExp(escapeRegExp(keyword), "gi"),
    })),
  );
  matcherCache.set(dictionary, matchers);
  return matchers;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
