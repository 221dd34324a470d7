/**
 * Chat orchestration
 * Resolves the session, records both sides of the turn, tracks topics and
 * context confidence, and delegates reply generation and idea search.
 * Turns on the same session are serialized; different sessions run freely.
 */

import { v4 as uuid } from "uuid";
import { z } from "zod";
import type {
  ChatMessage,
  ChatResponse,
  ChatSession,
  FeedbackResponse,
  IdeaSuggestion,
  MessageRole,
  SessionHistory,
  SessionListResult,
} from "../model";
import {
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_TURN_CONFIDENCE,
  MAX_CONTEXT_WINDOW,
  MAX_MESSAGE_LENGTH,
} from "../../config/chat";
import { NotFoundError, errorMessage, parseRequest } from "../errors";
import { createLogger } from "../logger";
import { KeyedMutex } from "../utils/mutex";
import { PlaceholderResponseGenerator, NoopIdeaSearcher } from "./responder";
import { InMemorySessionStore, type ListSessionsOptions, type SessionStore } from "./store";
import { extractTopics, mergeTopics } from "./topics";
import type { ContextOutcome, ContextRetriever, IdeaSearcher, ResponseGenerator } from "./types";
import type { IdeaStore } from "../ideas/store";

const log = createLogger("chat");

export function chatRequestSchema(defaultContextWindow: number = DEFAULT_CONTEXT_WINDOW) {
  return z.object({
    message: z
      .string()
      .max(MAX_MESSAGE_LENGTH)
      .refine((value) => value.trim().length > 0, "Message must not be empty"),
    sessionId: z.string().min(1).optional(),
    topics: z.array(z.string()).default([]),
    contextWindow: z.number().int().min(1).max(MAX_CONTEXT_WINDOW).default(defaultContextWindow),
    includeIdeas: z.boolean().default(false),
  });
}

export type ChatRequestInput = z.input<ReturnType<typeof chatRequestSchema>>;

export const FeedbackSchema = z.object({
  sessionId: z.string().min(1),
  ideaId: z.string().min(1),
  feedbackType: z.enum(["accept", "reject", "flag"]),
  comment: z.string().max(2000).optional(),
});

export type FeedbackInput = z.input<typeof FeedbackSchema>;

/**
 * Confidence a turn resolves to.
 * No retriever configured: the default turn confidence.
 * Retriever unavailable: keep the session's current confidence.
 * Retriever available: its confidence, clamped to [0, 1]; a non-finite value
 * counts as unavailable.
 */
export function resolveConfidence(outcome: ContextOutcome | null, currentConfidence: number): number {
  if (outcome === null) return DEFAULT_TURN_CONFIDENCE;
  if (!outcome.available || !Number.isFinite(outcome.confidence)) return currentConfidence;
  return Math.max(0, Math.min(1, outcome.confidence));
}

export interface ChatServiceOptions {
  store?: SessionStore;
  generator?: ResponseGenerator;
  contextRetriever?: ContextRetriever;
  ideaSearcher?: IdeaSearcher;
  /** When set, feedback on ideas it does not hold is refused */
  ideaStore?: IdeaStore;
  defaultContextWindow?: number;
  clock?: () => Date;
}

export class ChatService {
  private readonly store: SessionStore;
  private readonly generator: ResponseGenerator;
  private readonly contextRetriever?: ContextRetriever;
  private readonly ideaSearcher: IdeaSearcher;
  private readonly ideaStore?: IdeaStore;
  private readonly clock: () => Date;
  private readonly requestSchema: ReturnType<typeof chatRequestSchema>;
  private readonly locks = new KeyedMutex();

  constructor(options: ChatServiceOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.store = options.store ?? new InMemorySessionStore(this.clock);
    this.generator = options.generator ?? new PlaceholderResponseGenerator();
    this.contextRetriever = options.contextRetriever;
    this.ideaSearcher = options.ideaSearcher ?? new NoopIdeaSearcher();
    this.ideaStore = options.ideaStore;
    this.requestSchema = chatRequestSchema(options.defaultContextWindow);
  }

  createSession(userId?: string): ChatSession {
    const session = this.store.create(userId);
    log.info("New session created", { sessionId: session.id, userId: userId ?? null });
    return session;
  }

  getSession(sessionId: string): ChatSession | undefined {
    return this.store.get(sessionId);
  }

  listSessions(options: ListSessionsOptions = {}): SessionListResult {
    const result = this.store.list(options);
    log.debug("Sessions listed", { total: result.total, activeCount: result.activeCount });
    return result;
  }

  getHistory(sessionId: string): SessionHistory | undefined {
    return this.store.history(sessionId);
  }

  async sendMessage(input: ChatRequestInput): Promise<ChatResponse> {
    const request = parseRequest(this.requestSchema, input);
    const startedAt = performance.now();

    let sessionId: string;
    if (request.sessionId) {
      if (!this.store.get(request.sessionId)) {
        throw new NotFoundError("Session", request.sessionId);
      }
      sessionId = request.sessionId;
    } else {
      sessionId = this.createSession().id;
    }

    return this.locks.runExclusive(sessionId, async () => {
      const session = this.requireSession(sessionId);

      // Nothing is committed until the reply and suggestions are in hand
      const userMessage = this.buildMessage(sessionId, "user", request.message, session.contextConfidence);
      const topics = extractTopics(request.message, request.topics);
      const pending = this.applyTopics(session, topics);

      const outcome = await this.retrieveContext(request.message, pending);
      const confidence = resolveConfidence(outcome, session.contextConfidence);

      const content = await this.generator.generate({
        priorMessages: this.priorMessages(sessionId, userMessage, request.contextWindow),
        message: request.message,
        topics: pending.topics,
      });

      const ideas: IdeaSuggestion[] = request.includeIdeas ? await this.ideaSearcher.search(topics, pending) : [];

      const assistantMessage = this.buildMessage(
        sessionId,
        "assistant",
        content,
        confidence,
        ideas.map((idea) => idea.ideaId)
      );

      const now = this.clock();
      this.store.appendMessage(sessionId, userMessage);
      this.store.appendMessage(sessionId, assistantMessage);
      this.store.update(sessionId, (s) => {
        this.applyTopics(s, topics);
        s.messageCount += 2;
        s.contextConfidence = confidence;
        s.updatedAt = now;
        s.lastMessageAt = now;
      });

      const latencyMs = Math.round(performance.now() - startedAt);
      log.info("Message processed", {
        sessionId,
        latencyMs,
        ideasCount: ideas.length,
        contextConfidence: confidence,
      });

      return {
        sessionId,
        messageId: assistantMessage.id,
        content,
        ideas,
        topicsDiscussed: topics,
        contextConfidence: confidence,
        contextAvailable: outcome?.available ?? false,
        latencyMs,
      };
    });
  }

  async submitFeedback(input: FeedbackInput): Promise<FeedbackResponse> {
    const feedback = parseRequest(FeedbackSchema, input);

    if (!this.store.get(feedback.sessionId)) {
      return { success: false, message: `Session ${feedback.sessionId} not found` };
    }
    if (this.ideaStore && !this.ideaStore.get(feedback.ideaId)) {
      return { success: false, message: `Idea ${feedback.ideaId} not found` };
    }

    return this.locks.runExclusive(feedback.sessionId, async () => {
      const session = this.store.update(feedback.sessionId, (s) => {
        if (feedback.feedbackType === "accept") {
          s.ideasAccepted += 1;
          s.ideasGenerated += 1;
        } else if (feedback.feedbackType === "reject") {
          s.ideasRejected += 1;
          s.ideasGenerated += 1;
        }
        // "flag" is acknowledged only
      });

      log.info("Feedback recorded", {
        sessionId: session.id,
        ideaId: feedback.ideaId,
        feedbackType: feedback.feedbackType,
        hasComment: Boolean(feedback.comment),
      });

      return {
        success: true,
        message: "Feedback recorded successfully",
        updatedContextConfidence: session.contextConfidence,
      };
    });
  }

  /**
   * Deactivate a session. It stays readable but drops out of active listings.
   */
  async closeSession(sessionId: string): Promise<ChatSession> {
    return this.locks.runExclusive(sessionId, async () => {
      const session = this.store.update(sessionId, (s) => {
        s.isActive = false;
        s.updatedAt = this.clock();
      });
      log.info("Session closed", { sessionId });
      return session;
    });
  }

  private requireSession(sessionId: string): ChatSession {
    const session = this.store.get(sessionId);
    if (!session) {
      throw new NotFoundError("Session", sessionId);
    }
    return session;
  }

  private async retrieveContext(query: string, session: ChatSession): Promise<ContextOutcome | null> {
    if (!this.contextRetriever) return null;

    try {
      const outcome = await this.contextRetriever.retrieve(query, session);
      if (!outcome.available) {
        log.warn("Context unavailable, keeping session confidence", {
          sessionId: session.id,
          reason: outcome.reason,
        });
      }
      return outcome;
    } catch (error) {
      log.warn("Context retrieval failed, keeping session confidence", {
        sessionId: session.id,
        error: errorMessage(error),
      });
      return { available: false, reason: errorMessage(error) };
    }
  }

  /**
   * Last `contextWindow` messages counting the new user message, minus that message
   */
  private priorMessages(sessionId: string, userMessage: ChatMessage, contextWindow: number): ChatMessage[] {
    const messages = [...(this.store.history(sessionId)?.messages ?? []), userMessage];
    return messages.slice(-contextWindow).slice(0, -1);
  }

  /**
   * Merge this turn's topics into the session and bump their weights
   */
  private applyTopics(session: ChatSession, topics: string[]): ChatSession {
    session.topics = mergeTopics(session.topics, topics);
    for (const topic of topics) {
      session.topicWeights[topic] = (session.topicWeights[topic] ?? 0) + 1;
    }
    return session;
  }

  private buildMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    contextConfidence: number,
    ideaRefs: string[] = []
  ): ChatMessage {
    return {
      id: uuid(),
      sessionId,
      role,
      content,
      ideaRefs,
      contextConfidence,
      timestamp: this.clock(),
    };
  }
}
