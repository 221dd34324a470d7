/**
 * Core data models for Idea Scout
 */

export type SourceType = "url" | "rss" | "youtube" | "manual";

export interface Topic {
  name: string;
  keywords: string[];
  weight: number; // 0–1
  subtopics: string[];
}

export interface ScoringWeights {
  noveltyWeight: number;
  topicalityWeight: number;
  relevanceWeight: number;
  minimumScore: number; // 0–1
}

export interface FilterConfig {
  minContentLength: number;
  maxAgeDays: number;
  languages: string[];
}

export interface TopicsConfig {
  primaryTopics: Topic[];
  secondaryTopics: Topic[];
  excludeTopics: string[];
  scoring: ScoringWeights;
  filters: FilterConfig;
}

export interface Idea {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly sourceType: SourceType;
  readonly sourceUrl?: string;
  readonly sourceName?: string;
  readonly tags: readonly string[];
  readonly wordCount: number;
  readonly createdAt: Date;
  readonly publishedAt?: Date;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface IdeaScore {
  readonly ideaId: string;
  readonly relevance: number;
  readonly novelty: number;
  readonly topicality: number;
  readonly composite: number; // Not clamped: may exceed 1 when weights sum above 1
  readonly createdAt: Date;
}

export type IdeaStatus = "approved" | "rejected";

export interface IdeaDecision {
  ideaId: string;
  status: IdeaStatus;
  reason?: string;
  decidedAt: Date;
}

export type FilterReason = "content_too_short" | "too_old" | "unsupported_language";

export interface FilterResult {
  passed: boolean;
  reasons: FilterReason[];
}

export interface ScoredIdea {
  idea: Idea;
  score: IdeaScore;
  passesThreshold: boolean;
  filterResult: FilterResult;
}

export type MessageRole = "user" | "assistant";

export interface ChatMessage {
  readonly id: string;
  readonly sessionId: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly ideaRefs: readonly string[];
  readonly contextConfidence: number;
  readonly timestamp: Date;
}

export interface ChatSession {
  id: string;
  userId?: string;
  createdAt: Date;
  updatedAt: Date;
  lastMessageAt?: Date;
  isActive: boolean;
  messageCount: number;
  topics: string[];
  topicWeights: Record<string, number>;
  ideasGenerated: number;
  ideasAccepted: number;
  ideasRejected: number;
  contextConfidence: number; // 0–1
}

export type FeedbackType = "accept" | "reject" | "flag";

export interface FeedbackRequest {
  sessionId: string;
  ideaId: string;
  feedbackType: FeedbackType;
  comment?: string;
}

export interface FeedbackResponse {
  success: boolean;
  message: string;
  updatedContextConfidence?: number;
}

export interface IdeaSuggestion {
  ideaId: string;
  title: string;
  summary: string;
  score: number;
  sourceUrl?: string;
}

export interface ChatRequest {
  message: string;
  sessionId?: string;
  topics: string[];
  contextWindow: number;
  includeIdeas: boolean;
}

export interface ChatResponse {
  sessionId: string;
  messageId: string;
  content: string;
  ideas: IdeaSuggestion[];
  topicsDiscussed: string[];
  contextConfidence: number;
  contextAvailable: boolean;
  latencyMs: number;
}

export interface SessionListResult {
  sessions: ChatSession[];
  total: number;
  activeCount: number;
}

export interface SessionHistory {
  session: ChatSession;
  messages: ChatMessage[];
  ideasReferenced: string[];
}
