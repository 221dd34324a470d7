/**
 * Idea pipeline
 * Ingest → normalize → create idea → filter → score → store
 */

import { z } from "zod";
import type { Idea, IdeaDecision, ScoredIdea, SourceType } from "../model";
import type { IngestionClient, IngestedRecord } from "../ingest/types";
import type { IdeaStore } from "../ideas/store";
import { ConfigError, NotFoundError, errorMessage, parseRequest } from "../errors";
import { createLogger } from "../logger";
import { evaluateFilters } from "./filters";
import { createIdea, ideaFromRecord, normalizeRecord } from "./normalize";
import type { IdeaScorer } from "./score";

const log = createLogger("ideas");

export const IngestUrlSchema = z.object({
  url: z.string().url(),
  sourceName: z.string().min(1).optional(),
});

export const IngestFeedSchema = z.object({
  feedUrl: z.string().url(),
  maxEntries: z.number().int().min(1).max(50).default(10),
});

export const IngestYoutubeSchema = z.object({
  videoId: z.string().length(11),
});

export const ManualIdeaSchema = z.object({
  title: z.string().min(1).max(500),
  content: z.string().min(100),
  sourceName: z.string().min(1).default("Manual Entry"),
  tags: z.array(z.string()).default([]),
});

export interface IdeaServiceOptions {
  scorer: IdeaScorer;
  store: IdeaStore;
  ingestion?: IngestionClient;
  now?: () => Date;
}

export class IdeaService {
  private readonly scorer: IdeaScorer;
  private readonly store: IdeaStore;
  private readonly ingestion?: IngestionClient;
  private readonly now: () => Date;

  constructor(options: IdeaServiceOptions) {
    this.scorer = options.scorer;
    this.store = options.store;
    this.ingestion = options.ingestion;
    this.now = options.now ?? (() => new Date());
  }

  async ingestUrl(input: z.input<typeof IngestUrlSchema>): Promise<ScoredIdea> {
    const request = parseRequest(IngestUrlSchema, input);
    const client = this.requireIngestion();

    const record = await this.fetchOrLog("Failed to ingest URL", { url: request.url }, () =>
      client.fetchUrl(request.url)
    );
    const idea = ideaFromRecord(normalizeRecord(record), "url", request.sourceName ?? record.url);
    return this.scoreAndStore(idea, { url: request.url });
  }

  async ingestFeed(input: z.input<typeof IngestFeedSchema>): Promise<ScoredIdea[]> {
    const request = parseRequest(IngestFeedSchema, input);
    const client = this.requireIngestion();

    const records = await this.fetchOrLog("Failed to ingest RSS feed", { feedUrl: request.feedUrl }, () =>
      client.fetchFeed(request.feedUrl, request.maxEntries)
    );

    const results: ScoredIdea[] = [];
    for (const record of records.slice(0, request.maxEntries)) {
      const idea = ideaFromRecord(normalizeRecord(record), "rss", request.feedUrl);
      results.push(await this.scoreAndStore(idea, { feedUrl: request.feedUrl }));
    }

    log.info("RSS feed ingested", {
      feedUrl: request.feedUrl,
      entriesCount: results.length,
      passedCount: results.filter((r) => r.passesThreshold).length,
    });

    return results;
  }

  async ingestYoutube(input: z.input<typeof IngestYoutubeSchema>): Promise<ScoredIdea> {
    const request = parseRequest(IngestYoutubeSchema, input);
    const client = this.requireIngestion();

    const record = await this.fetchOrLog("Failed to ingest YouTube video", { videoId: request.videoId }, () =>
      client.fetchTranscript(request.videoId)
    );
    const base = normalizeRecord(record);
    const normalized: IngestedRecord = {
      ...base,
      title: base.title || `YouTube: ${request.videoId}`,
      videoId: base.videoId ?? request.videoId,
    };
    const idea = ideaFromRecord(normalized, "youtube", `YouTube: ${request.videoId}`);
    return this.scoreAndStore(idea, { videoId: request.videoId });
  }

  async createManualIdea(input: z.input<typeof ManualIdeaSchema>): Promise<ScoredIdea> {
    const request = parseRequest(ManualIdeaSchema, input);

    const idea = createIdea({
      title: request.title,
      content: request.content,
      sourceType: "manual",
      sourceName: request.sourceName,
      tags: request.tags,
    });
    return this.scoreAndStore(idea, { title: request.title });
  }

  getIdea(ideaId: string): ScoredIdea {
    const entry = this.store.get(ideaId);
    if (!entry) {
      throw new NotFoundError("Idea", ideaId);
    }
    return entry;
  }

  listIdeas(options: { sourceType?: SourceType; passingOnly?: boolean } = {}): ScoredIdea[] {
    return this.store
      .list()
      .filter((entry) => !options.sourceType || entry.idea.sourceType === options.sourceType)
      .filter((entry) => !options.passingOnly || entry.passesThreshold);
  }

  approveIdea(ideaId: string): IdeaDecision {
    return this.decide(ideaId, "approved");
  }

  rejectIdea(ideaId: string, reason?: string): IdeaDecision {
    return this.decide(ideaId, "rejected", reason);
  }

  private decide(ideaId: string, status: IdeaDecision["status"], reason?: string): IdeaDecision {
    this.getIdea(ideaId);

    const decision: IdeaDecision = { ideaId, status, reason, decidedAt: this.now() };
    this.store.recordDecision(decision);

    log.info(status === "approved" ? "Idea approved" : "Idea rejected", {
      ideaId,
      reason: reason ?? "Not specified",
    });
    return decision;
  }

  private async scoreAndStore(idea: Idea, context: Record<string, unknown>): Promise<ScoredIdea> {
    const score = await this.scorer.score(idea);
    const passes = this.scorer.passesThreshold(score);
    const filterResult = evaluateFilters(idea, this.scorer.config.filters, this.now());

    const entry: ScoredIdea = { idea, score, passesThreshold: passes, filterResult };
    this.store.save(entry);

    log.info("Idea ingested and scored", {
      ...context,
      ideaId: idea.id,
      sourceType: idea.sourceType,
      score: Number(score.composite.toFixed(4)),
      passes,
      filterReasons: filterResult.reasons,
    });

    return entry;
  }

  private requireIngestion(): IngestionClient {
    if (!this.ingestion) {
      throw new ConfigError("No ingestion client configured");
    }
    return this.ingestion;
  }

  private async fetchOrLog<T>(message: string, meta: Record<string, unknown>, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (error) {
      log.error(message, { ...meta, error: errorMessage(error) });
      throw error;
    }
  }
}
