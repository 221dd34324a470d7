/**
 * Relevance scoring
 * Keyword overlap between an idea and the configured topics.
 * Excluded keywords veto; the best single primary and secondary topic win.
 */

import type { Idea, Topic, TopicsConfig } from "../model";

const PRIMARY_SHARE = 0.7;
const SECONDARY_SHARE = 0.3;

export interface RelevanceBreakdown {
  relevance: number;
  primaryScore: number;
  secondaryScore: number;
  primaryMatches: string[];
  secondaryMatches: string[];
  excludedKeyword: string | null;
}

export function buildHaystack(idea: Pick<Idea, "title" | "content">): string {
  return `${idea.title} ${idea.content}`.toLowerCase();
}

/**
 * Count distinct keywords present in the haystack (each counted once)
 */
export function countKeywordHits(haystack: string, keywords: readonly string[]): number {
  return keywords.reduce((count, keyword) => (haystack.includes(keyword.toLowerCase()) ? count + 1 : count), 0);
}

/**
 * Contribution of one topic: min(hits / keywords, 1) × weight.
 * A topic without keywords contributes nothing.
 */
export function topicContribution(haystack: string, topic: Topic): number {
  if (topic.keywords.length === 0) return 0;
  const hits = countKeywordHits(haystack, topic.keywords);
  return Math.min(hits / topic.keywords.length, 1) * topic.weight;
}

function bestTopic(haystack: string, topics: readonly Topic[]): { score: number; matches: string[] } {
  let score = 0;
  const matches: string[] = [];

  for (const topic of topics) {
    const contribution = topicContribution(haystack, topic);
    if (contribution > 0) {
      matches.push(topic.name);
      score = Math.max(score, contribution);
    }
  }

  return { score, matches };
}

export function findExcludedKeyword(haystack: string, excludeTopics: readonly string[]): string | null {
  return excludeTopics.find((keyword) => haystack.includes(keyword.toLowerCase())) ?? null;
}

export function computeRelevance(
  idea: Pick<Idea, "title" | "content">,
  config: Pick<TopicsConfig, "primaryTopics" | "secondaryTopics" | "excludeTopics">
): RelevanceBreakdown {
  const haystack = buildHaystack(idea);

  const excludedKeyword = findExcludedKeyword(haystack, config.excludeTopics);
  if (excludedKeyword !== null) {
    return {
      relevance: 0,
      primaryScore: 0,
      secondaryScore: 0,
      primaryMatches: [],
      secondaryMatches: [],
      excludedKeyword,
    };
  }

  const primary = bestTopic(haystack, config.primaryTopics);
  const secondary = bestTopic(haystack, config.secondaryTopics);

  return {
    relevance: Math.min(1, primary.score * PRIMARY_SHARE + secondary.score * SECONDARY_SHARE),
    primaryScore: primary.score,
    secondaryScore: secondary.score,
    primaryMatches: primary.matches,
    secondaryMatches: secondary.matches,
    excludedKeyword: null,
  };
}
