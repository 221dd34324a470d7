/**
 * Idea Scout entry point
 * Wires configuration, scoring, the idea pipeline and the chat service.
 */

import type { TopicsConfig } from "./lib/model";
import type { IngestionClient } from "./lib/ingest/types";
import type { ContextRetriever, IdeaSearcher, ResponseGenerator } from "./lib/chat/types";
import { getAppEnv } from "./config/env";
import { loadTopicsConfig } from "./config/topics";
import { ChatService } from "./lib/chat/service";
import { InMemorySessionStore, type SessionStore } from "./lib/chat/store";
import { StoreIdeaSearcher } from "./lib/chat/responder";
import { InMemoryIdeaStore, type IdeaStore } from "./lib/ideas/store";
import { createPlaceholderEstimators, type Estimators } from "./lib/pipeline/estimators";
import { IdeaService } from "./lib/pipeline/ideas";
import { IdeaScorer } from "./lib/pipeline/score";
import { logger } from "./lib/logger";

export interface IdeaScoutOptions {
  config?: TopicsConfig;
  configPath?: string;
  estimators?: Estimators;
  ingestion?: IngestionClient;
  generator?: ResponseGenerator;
  contextRetriever?: ContextRetriever;
  ideaSearcher?: IdeaSearcher;
  sessionStore?: SessionStore;
  ideaStore?: IdeaStore;
}

export interface IdeaScout {
  config: TopicsConfig;
  scorer: IdeaScorer;
  ideas: IdeaService;
  chat: ChatService;
}

/**
 * Build the services. Throws ConfigError when configuration is unusable.
 */
export function createIdeaScout(options: IdeaScoutOptions = {}): IdeaScout {
  const env = getAppEnv();
  const config = options.config ?? loadTopicsConfig(options.configPath ?? env.topicsConfigPath);

  const ideaStore = options.ideaStore ?? new InMemoryIdeaStore();
  const scorer = new IdeaScorer(config, options.estimators ?? createPlaceholderEstimators());
  const ideas = new IdeaService({ scorer, store: ideaStore, ingestion: options.ingestion });
  const chat = new ChatService({
    store: options.sessionStore ?? new InMemorySessionStore(),
    generator: options.generator,
    contextRetriever: options.contextRetriever,
    ideaSearcher: options.ideaSearcher ?? new StoreIdeaSearcher(ideaStore),
    ideaStore,
    defaultContextWindow: env.contextWindow,
  });

  logger.info("Idea Scout ready", {
    primaryTopics: config.primaryTopics.length,
    minimumScore: config.scoring.minimumScore,
    contextWindow: env.contextWindow,
  });

  return { config, scorer, ideas, chat };
}

export * from "./lib/model";
export type { IngestionClient, IngestedRecord } from "./lib/ingest/types";
export type {
  ContextOutcome,
  ContextRetriever,
  GenerateReplyInput,
  IdeaSearcher,
  ResponseGenerator,
} from "./lib/chat/types";
export type { SessionStore, ListSessionsOptions } from "./lib/chat/store";
export type { IdeaStore } from "./lib/ideas/store";
export type { Estimators, NoveltyEstimator, TopicalityEstimator } from "./lib/pipeline/estimators";
export type { RelevanceBreakdown } from "./lib/pipeline/relevance";
export { ChatService, resolveConfidence } from "./lib/chat/service";
export { InMemorySessionStore } from "./lib/chat/store";
export { PlaceholderResponseGenerator, NoopIdeaSearcher, StoreIdeaSearcher, buildPrompt } from "./lib/chat/responder";
export { InMemoryIdeaStore } from "./lib/ideas/store";
export { IdeaService } from "./lib/pipeline/ideas";
export { IdeaScorer, scoreIdea, passesThreshold } from "./lib/pipeline/score";
export { computeRelevance } from "./lib/pipeline/relevance";
export {
  PlaceholderNoveltyEstimator,
  PlaceholderTopicalityEstimator,
  createPlaceholderEstimators,
} from "./lib/pipeline/estimators";
export { evaluateFilters } from "./lib/pipeline/filters";
export { loadTopicsConfig, parseTopicsConfig } from "./config/topics";
export { NotFoundError, ValidationError, ConfigError } from "./lib/errors";
export { createLogger, logger } from "./lib/logger";
