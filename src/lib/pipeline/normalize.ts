/**
 * Normalization pipeline
 * Converts ingested records and manual input into immutable Idea objects
 */

import { v4 as uuid } from "uuid";
import type { Idea, SourceType } from "../model";
import type { IngestedRecord } from "../ingest/types";
import { collapseBlankLines, countWords, decodeHtmlEntities } from "../utils/text";

/**
 * Decode entities, drop blank lines and fill in a missing word count
 */
export function normalizeRecord(record: IngestedRecord): IngestedRecord {
  const title = decodeHtmlEntities(record.title).trim();
  const content = collapseBlankLines(decodeHtmlEntities(record.content));

  return {
    ...record,
    title,
    content,
    wordCount: record.wordCount ?? countWords(content),
  };
}

export interface IdeaInput {
  title: string;
  content: string;
  sourceType: SourceType;
  sourceUrl?: string;
  sourceName?: string;
  tags?: string[];
  wordCount?: number;
  publishedAt?: Date;
  metadata?: Record<string, string>;
}

export function createIdea(input: IdeaInput): Idea {
  const idea: Idea = {
    id: uuid(),
    title: input.title,
    content: input.content,
    sourceType: input.sourceType,
    sourceUrl: input.sourceUrl,
    sourceName: input.sourceName,
    tags: Object.freeze([...(input.tags ?? [])]),
    wordCount: input.wordCount ?? countWords(input.content),
    createdAt: new Date(),
    publishedAt: input.publishedAt,
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  };
  return Object.freeze(idea);
}

/**
 * Build an Idea from a normalized ingestion record
 */
export function ideaFromRecord(
  record: IngestedRecord,
  sourceType: SourceType,
  sourceName?: string
): Idea {
  const metadata: Record<string, string> = {};
  if (record.author) metadata.author = record.author;
  if (record.videoId) metadata.videoId = record.videoId;

  return createIdea({
    title: record.title,
    content: record.content,
    sourceType,
    sourceUrl: record.url || undefined,
    sourceName: sourceName ?? record.url,
    wordCount: record.wordCount,
    publishedAt: record.publishedAt,
    metadata,
  });
}
