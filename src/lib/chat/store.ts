/**
 * Chat session store
 * Owns every ChatSession and ChatMessage. Reads hand out copies so callers
 * can only change state through appendMessage and update.
 */

import { v4 as uuid } from "uuid";
import type { ChatMessage, ChatSession, SessionHistory, SessionListResult } from "../model";
import { INITIAL_SESSION_CONFIDENCE } from "../../config/chat";
import { NotFoundError } from "../errors";

export interface ListSessionsOptions {
  userId?: string;
  activeOnly?: boolean;
}

export interface SessionStore {
  create(userId?: string): ChatSession;
  get(sessionId: string): ChatSession | undefined;
  list(options?: ListSessionsOptions): SessionListResult;
  appendMessage(sessionId: string, message: ChatMessage): void;
  history(sessionId: string): SessionHistory | undefined;
  update(sessionId: string, mutate: (session: ChatSession) => void): ChatSession;
}

function snapshot(session: ChatSession): ChatSession {
  return {
    ...session,
    topics: [...session.topics],
    topicWeights: { ...session.topicWeights },
  };
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly messages = new Map<string, ChatMessage[]>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  create(userId?: string): ChatSession {
    const now = this.clock();
    const session: ChatSession = {
      id: uuid(),
      userId,
      createdAt: now,
      updatedAt: now,
      isActive: true,
      messageCount: 0,
      topics: [],
      topicWeights: {},
      ideasGenerated: 0,
      ideasAccepted: 0,
      ideasRejected: 0,
      contextConfidence: INITIAL_SESSION_CONFIDENCE,
    };

    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    return snapshot(session);
  }

  get(sessionId: string): ChatSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? snapshot(session) : undefined;
  }

  list(options: ListSessionsOptions = {}): SessionListResult {
    let sessions = Array.from(this.sessions.values());

    if (options.userId) {
      sessions = sessions.filter((s) => s.userId === options.userId);
    }
    if (options.activeOnly) {
      sessions = sessions.filter((s) => s.isActive);
    }

    return {
      sessions: sessions.map(snapshot),
      total: sessions.length,
      activeCount: sessions.filter((s) => s.isActive).length,
    };
  }

  appendMessage(sessionId: string, message: ChatMessage): void {
    const messages = this.messages.get(sessionId);
    if (!messages) {
      throw new NotFoundError("Session", sessionId);
    }
    if (message.sessionId !== sessionId) {
      throw new Error(`Message ${message.id} belongs to session ${message.sessionId}, not ${sessionId}`);
    }
    messages.push(Object.freeze({ ...message, ideaRefs: Object.freeze([...message.ideaRefs]) }));
  }

  history(sessionId: string): SessionHistory | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    const messages = [...(this.messages.get(sessionId) ?? [])];
    const ideasReferenced = new Set<string>();
    for (const message of messages) {
      message.ideaRefs.forEach((ref) => ideasReferenced.add(ref));
    }

    return {
      session: snapshot(session),
      messages,
      ideasReferenced: Array.from(ideasReferenced),
    };
  }

  update(sessionId: string, mutate: (session: ChatSession) => void): ChatSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError("Session", sessionId);
    }
    mutate(session);
    return snapshot(session);
  }
}
