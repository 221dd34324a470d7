/**
 * Topic configuration
 * Weighted keyword lists, scoring weights and content filters.
 * Loaded once at startup from a JSON document; any problem is fatal.
 */

import fs from "fs";
import { z } from "zod";
import type { TopicsConfig } from "../lib/model";
import { ConfigError, errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { getAppEnv } from "./env";

const TopicSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  weight: z.number().min(0).max(1),
  subtopics: z.array(z.string()).default([]),
});

const ScoringSchema = z.object({
  novelty_weight: z.number().min(0).default(0.4),
  topicality_weight: z.number().min(0).default(0.3),
  relevance_weight: z.number().min(0).default(0.3),
  minimum_score: z.number().min(0).max(1).default(0.65),
});

const FiltersSchema = z.object({
  min_content_length: z.number().int().min(0).default(500),
  max_age_days: z.number().int().min(1).default(7),
  languages: z.array(z.string().min(2)).min(1).default(["en"]),
});

const TopicsDocumentSchema = z.object({
  topics: z.object({
    primary: z.array(TopicSchema).min(1, "at least one primary topic is required"),
    secondary: z.array(TopicSchema).default([]),
    exclude: z.array(z.string().min(1)).default([]),
  }),
  scoring: ScoringSchema.default({}),
  filters: FiltersSchema.default({}),
});

/**
 * Validate a raw topics document and convert it to the runtime shape
 */
export function parseTopicsConfig(raw: unknown): TopicsConfig {
  const result = TopicsDocumentSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid topics configuration: ${details}`);
  }

  const { topics, scoring, filters } = result.data;
  return {
    primaryTopics: topics.primary,
    secondaryTopics: topics.secondary,
    excludeTopics: topics.exclude,
    scoring: {
      noveltyWeight: scoring.novelty_weight,
      topicalityWeight: scoring.topicality_weight,
      relevanceWeight: scoring.relevance_weight,
      minimumScore: scoring.minimum_score,
    },
    filters: {
      minContentLength: filters.min_content_length,
      maxAgeDays: filters.max_age_days,
      languages: filters.languages,
    },
  };
}

/**
 * Load topics configuration from disk
 * Defaults to TOPICS_CONFIG_PATH (config/topics.json)
 */
export function loadTopicsConfig(configPath: string = getAppEnv().topicsConfigPath): TopicsConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read topics configuration at ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Topics configuration at ${configPath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const config = parseTopicsConfig(raw);
  logger.info("Loaded topics configuration", {
    path: configPath,
    primaryTopics: config.primaryTopics.length,
    secondaryTopics: config.secondaryTopics.length,
    excludeTopics: config.excludeTopics.length,
  });

  return config;
}
