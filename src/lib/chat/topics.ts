/**
 * Topic extraction for chat turns
 */

import { TOPIC_VOCABULARY } from "../../config/chat";

/**
 * Explicit topics first (deduplicated), then vocabulary keywords found in
 * the message as case-insensitive substrings
 */
export function extractTopics(
  message: string,
  explicitTopics: readonly string[] = [],
  vocabulary: readonly string[] = TOPIC_VOCABULARY
): string[] {
  const topics: string[] = [];
  for (const topic of explicitTopics) {
    const trimmed = topic.trim();
    if (trimmed && !topics.includes(trimmed)) topics.push(trimmed);
  }

  const lowered = message.toLowerCase();
  for (const keyword of vocabulary) {
    if (lowered.includes(keyword.toLowerCase()) && !topics.includes(keyword)) {
      topics.push(keyword);
    }
  }

  return topics;
}

/**
 * Append unseen topics to an ordered topic list, keeping first-seen order
 */
export function mergeTopics(existing: readonly string[], incoming: readonly string[]): string[] {
  const merged = [...existing];
  for (const topic of incoming) {
    if (!merged.includes(topic)) merged.push(topic);
  }
  return merged;
}
