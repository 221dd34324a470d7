/**
 * Tests for chat orchestration
 */

import { describe, it, expect, vi } from "vitest";
import { ChatService, FeedbackSchema, resolveConfidence } from "../../../src/lib/chat/service";
import { StoreIdeaSearcher } from "../../../src/lib/chat/responder";
import { InMemoryIdeaStore } from "../../../src/lib/ideas/store";
import { createIdea } from "../../../src/lib/pipeline/normalize";
import { NotFoundError, ValidationError } from "../../../src/lib/errors";
import type { ContextRetriever, GenerateReplyInput, ResponseGenerator } from "../../../src/lib/chat/types";

function retriever(retrieve: ContextRetriever["retrieve"]): ContextRetriever {
  return { retrieve };
}

describe("resolveConfidence", () => {
  it("uses the default turn confidence without a retriever", () => {
    expect(resolveConfidence(null, 0.5)).toBe(0.8);
  });

  it("keeps the current confidence when context is unavailable", () => {
    expect(resolveConfidence({ available: false, reason: "offline" }, 0.42)).toBe(0.42);
  });

  it("clamps retriever confidence", () => {
    expect(resolveConfidence({ available: true, confidence: 1.7 }, 0.5)).toBe(1);
    expect(resolveConfidence({ available: true, confidence: -1 }, 0.5)).toBe(0);
  });

  it("treats a non-finite confidence as unavailable", () => {
    expect(resolveConfidence({ available: true, confidence: Number.NaN }, 0.42)).toBe(0.42);
    expect(resolveConfidence({ available: true, confidence: Number.POSITIVE_INFINITY }, 0.42)).toBe(0.42);
  });
});

describe("ChatService", () => {
  describe("sendMessage", () => {
    it("creates a session when none is given and records both turns", async () => {
      const service = new ChatService();
      const response = await service.sendMessage({ message: "Hello there" });

      expect(response.content).toBe(
        "I understand you're interested in Hello there... Let me help you explore this further. What specific aspects would you like to explore?"
      );
      expect(response.ideas).toEqual([]);
      expect(response.topicsDiscussed).toEqual([]);
      expect(response.contextConfidence).toBe(0.8);
      expect(response.contextAvailable).toBe(false);

      const history = service.getHistory(response.sessionId);
      expect(history?.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
      expect(history?.messages[1]?.id).toBe(response.messageId);
      expect(history?.session.messageCount).toBe(2);
    });

    it("reuses a session across turns", async () => {
      const service = new ChatService();
      const { sessionId } = await service.sendMessage({ message: "first" });
      await service.sendMessage({ message: "second", sessionId });
      await service.sendMessage({ message: "third", sessionId });

      const history = service.getHistory(sessionId);
      expect(history?.messages.map((m) => m.role)).toEqual([
        "user",
        "assistant",
        "user",
        "assistant",
        "user",
        "assistant",
      ]);
      expect(history?.session.messageCount).toBe(6);
      expect(service.listSessions().total).toBe(1);
    });

    it("starts a fresh session for every send without a session id", async () => {
      const service = new ChatService();
      const first = await service.sendMessage({ message: "first" });
      const second = await service.sendMessage({ message: "second" });

      expect(first.sessionId).not.toBe(second.sessionId);
      expect(service.listSessions().total).toBe(2);
    });

    it("leaves no trace of a turn whose generation fails", async () => {
      let calls = 0;
      const generator: ResponseGenerator = {
        generate: async (input) => {
          calls += 1;
          if (calls === 2) throw new Error("model unavailable");
          return `reply to ${input.message}`;
        },
      };
      const service = new ChatService({ generator });
      const { sessionId } = await service.sendMessage({ message: "hello" });

      await expect(service.sendMessage({ message: "treasury update", sessionId })).rejects.toThrow("model unavailable");

      const afterFailure = service.getHistory(sessionId);
      expect(afterFailure?.messages.map((m) => m.content)).toEqual(["hello", "reply to hello"]);
      expect(afterFailure?.session.messageCount).toBe(2);
      expect(afterFailure?.session.topics).toEqual([]);
      expect(afterFailure?.session.topicWeights).toEqual({});

      await service.sendMessage({ message: "again", sessionId });
      const history = service.getHistory(sessionId);
      expect(history?.messages.map((m) => m.role)).toEqual(["user", "assistant", "user", "assistant"]);
      expect(history?.session.messageCount).toBe(4);
    });

    it("propagates idea search failures without recording the turn", async () => {
      const service = new ChatService({
        ideaSearcher: {
          search: async () => {
            throw new Error("search index down");
          },
        },
      });
      const { id } = service.createSession();

      await expect(service.sendMessage({ message: "treasury", sessionId: id, includeIdeas: true })).rejects.toThrow(
        "search index down"
      );
      expect(service.getHistory(id)?.messages).toEqual([]);
      expect(service.getSession(id)?.messageCount).toBe(0);
    });

    it("throws NotFoundError for an unknown session", async () => {
      const service = new ChatService();
      await expect(service.sendMessage({ message: "hi", sessionId: "missing" })).rejects.toBeInstanceOf(NotFoundError);
    });

    it("rejects blank messages without creating a session", async () => {
      const service = new ChatService();
      await expect(service.sendMessage({ message: "   " })).rejects.toBeInstanceOf(ValidationError);
      expect(service.listSessions().total).toBe(0);
    });

    it("rejects context windows outside 1..50", async () => {
      const service = new ChatService();
      await expect(service.sendMessage({ message: "hi", contextWindow: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.sendMessage({ message: "hi", contextWindow: 51 })).rejects.toBeInstanceOf(ValidationError);
    });

    it("tracks topics and their weights on the session", async () => {
      const service = new ChatService();
      const response = await service.sendMessage({
        message: "Thoughts on treasury and liquidity?",
        topics: ["stablecoins"],
      });
      await service.sendMessage({ message: "More treasury please", sessionId: response.sessionId });

      expect(response.topicsDiscussed).toEqual(["stablecoins", "liquidity", "treasury"]);
      const session = service.getSession(response.sessionId);
      expect(session?.topics).toEqual(["stablecoins", "liquidity", "treasury"]);
      expect(session?.topicWeights).toEqual({ stablecoins: 1, liquidity: 1, treasury: 2 });
    });

    it("passes only the prior messages inside the context window", async () => {
      const inputs: GenerateReplyInput[] = [];
      const generator: ResponseGenerator = {
        generate: async (input) => {
          inputs.push(input);
          return `reply ${inputs.length}`;
        },
      };
      const service = new ChatService({ generator });

      const { sessionId } = await service.sendMessage({ message: "u1" });
      await service.sendMessage({ message: "u2", sessionId });
      await service.sendMessage({ message: "u3", sessionId, contextWindow: 3 });

      expect(inputs[0]?.priorMessages).toEqual([]);
      expect(inputs[2]?.priorMessages.map((m) => m.content)).toEqual(["u2", "reply 2"]);
      expect(inputs[2]?.message).toBe("u3");
    });

    it("stamps user messages with the confidence before the turn", async () => {
      const service = new ChatService();
      const { sessionId } = await service.sendMessage({ message: "first" });
      await service.sendMessage({ message: "second", sessionId });

      const confidences = service.getHistory(sessionId)?.messages.map((m) => m.contextConfidence);
      expect(confidences).toEqual([0.5, 0.8, 0.8, 0.8]);
    });
  });

  describe("context retrieval", () => {
    it("uses the retriever's confidence when context is available", async () => {
      const retrieve = vi.fn<ContextRetriever["retrieve"]>().mockResolvedValue({ available: true, confidence: 0.95 });
      const service = new ChatService({ contextRetriever: retriever(retrieve) });

      const response = await service.sendMessage({ message: "treasury" });

      expect(retrieve).toHaveBeenCalledWith("treasury", expect.objectContaining({ id: response.sessionId }));
      expect(response.contextConfidence).toBe(0.95);
      expect(response.contextAvailable).toBe(true);
      expect(service.getSession(response.sessionId)?.contextConfidence).toBe(0.95);
    });

    it("keeps the session confidence when the retriever fails", async () => {
      const service = new ChatService({
        contextRetriever: retriever(async () => {
          throw new Error("index offline");
        }),
      });

      const response = await service.sendMessage({ message: "hello" });

      expect(response.contextConfidence).toBe(0.5);
      expect(response.contextAvailable).toBe(false);
      expect(response.content).toContain("hello");
    });

    it("keeps the session confidence when the retriever reports NaN", async () => {
      const service = new ChatService({
        contextRetriever: retriever(async () => ({ available: true, confidence: Number.NaN })),
      });
      const response = await service.sendMessage({ message: "hello" });

      expect(response.contextConfidence).toBe(0.5);
      expect(service.getSession(response.sessionId)?.contextConfidence).toBe(0.5);
    });

    it("clamps out-of-range confidence", async () => {
      const service = new ChatService({
        contextRetriever: retriever(async () => ({ available: true, confidence: 1.7 })),
      });
      const response = await service.sendMessage({ message: "hello" });
      expect(response.contextConfidence).toBe(1);
    });
  });

  describe("idea suggestions", () => {
    it("searches ideas only when asked and records the references", async () => {
      const ideaStore = new InMemoryIdeaStore();
      const idea = createIdea({ title: "Deposit tokens", content: "Tokenized treasury deposits", sourceType: "manual" });
      ideaStore.save({
        idea,
        score: { ideaId: idea.id, relevance: 0.6, novelty: 0.8, topicality: 0.7, composite: 0.71, createdAt: new Date() },
        passesThreshold: true,
        filterResult: { passed: true, reasons: [] },
      });
      const service = new ChatService({ ideaSearcher: new StoreIdeaSearcher(ideaStore) });

      const plain = await service.sendMessage({ message: "treasury news" });
      expect(plain.ideas).toEqual([]);

      const withIdeas = await service.sendMessage({
        message: "treasury news",
        sessionId: plain.sessionId,
        includeIdeas: true,
      });

      expect(withIdeas.ideas.map((s) => s.ideaId)).toEqual([idea.id]);
      const history = service.getHistory(plain.sessionId);
      expect(history?.messages[3]?.ideaRefs).toEqual([idea.id]);
      expect(history?.ideasReferenced).toEqual([idea.id]);
    });
  });

  describe("submitFeedback", () => {
    it("counts accepts and rejects and acknowledges flags", async () => {
      const service = new ChatService();
      const { id } = service.createSession("user-1");

      await service.submitFeedback({ sessionId: id, ideaId: "i1", feedbackType: "accept" });
      await service.submitFeedback({ sessionId: id, ideaId: "i2", feedbackType: "reject", comment: "off topic" });
      const flagged = await service.submitFeedback({ sessionId: id, ideaId: "i3", feedbackType: "flag" });

      expect(flagged).toEqual({
        success: true,
        message: "Feedback recorded successfully",
        updatedContextConfidence: 0.5,
      });
      expect(service.getSession(id)).toMatchObject({ ideasGenerated: 2, ideasAccepted: 1, ideasRejected: 1 });
    });

    it("refuses feedback on ideas the idea store does not hold", async () => {
      const ideaStore = new InMemoryIdeaStore();
      const service = new ChatService({ ideaStore });
      const { id } = service.createSession();

      await expect(
        service.submitFeedback({ sessionId: id, ideaId: "unknown-idea", feedbackType: "accept" })
      ).resolves.toEqual({ success: false, message: "Idea unknown-idea not found" });
      expect(service.getSession(id)).toMatchObject({ ideasGenerated: 0, ideasAccepted: 0 });
    });

    it("reports unknown sessions without throwing", async () => {
      const service = new ChatService();
      await expect(
        service.submitFeedback({ sessionId: "missing", ideaId: "i1", feedbackType: "accept" })
      ).resolves.toEqual({ success: false, message: "Session missing not found" });
    });

    it("accepts only accept, reject and flag", () => {
      expect(FeedbackSchema.safeParse({ sessionId: "s1", ideaId: "i1", feedbackType: "love" }).success).toBe(false);
      expect(FeedbackSchema.safeParse({ sessionId: "s1", ideaId: "i1", feedbackType: "flag" }).success).toBe(true);
    });
  });

  describe("sessions", () => {
    it("returns a created session by id", () => {
      const service = new ChatService();
      const created = service.createSession("user-1");
      const fetched = service.getSession(created.id);

      expect(fetched?.id).toBe(created.id);
      expect(fetched?.messageCount).toBe(0);
      expect(fetched?.isActive).toBe(true);
      expect(fetched?.userId).toBe("user-1");
    });

    it("closes a session but keeps its history readable", async () => {
      const service = new ChatService();
      const { sessionId } = await service.sendMessage({ message: "hello" });
      service.createSession();

      const closed = await service.closeSession(sessionId);

      expect(closed.isActive).toBe(false);
      expect(service.getHistory(sessionId)?.messages).toHaveLength(2);
      expect(service.listSessions({ activeOnly: true }).sessions.map((s) => s.id)).not.toContain(sessionId);
      expect(service.listSessions()).toMatchObject({ total: 2, activeCount: 1 });
    });

    it("throws NotFoundError when closing an unknown session", async () => {
      await expect(new ChatService().closeSession("missing")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("serializes concurrent turns on one session", async () => {
      const generator: ResponseGenerator = {
        generate: (input) =>
          new Promise((resolve) => setTimeout(() => resolve(`echo ${input.message}`), input.message === "a" ? 20 : 1)),
      };
      const service = new ChatService({ generator });
      const { id } = service.createSession();

      await Promise.all([
        service.sendMessage({ message: "a", sessionId: id }),
        service.sendMessage({ message: "b", sessionId: id }),
        service.sendMessage({ message: "c", sessionId: id }),
      ]);

      const history = service.getHistory(id);
      expect(history?.messages.map((m) => m.content)).toEqual(["a", "echo a", "b", "echo b", "c", "echo c"]);
      expect(history?.session.messageCount).toBe(6);
    });
  });
});
