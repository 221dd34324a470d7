/**
 * Default chat collaborators
 * The placeholder generator builds the model prompt but answers from a
 * template until a model client is wired in.
 */

import type { ChatMessage, ChatSession, IdeaSuggestion } from "../model";
import type { IdeaStore } from "../ideas/store";
import type { GenerateReplyInput, IdeaSearcher, ResponseGenerator } from "./types";
import { MAX_IDEA_SUGGESTIONS } from "../../config/chat";
import { createLogger } from "../logger";
import { truncate } from "../utils/text";

const log = createLogger("chat");

const PERSONA =
  "You are Idea Scout, an ideation and reflection agent. You help users discover insights, explore ideas, and think through topics deeply.";

export function formatPriorContext(messages: readonly ChatMessage[]): string {
  if (messages.length === 0) return "No prior context";
  return messages.map((m) => `${m.role === "assistant" ? "You" : "User"}: ${m.content}`).join("\n");
}

export function buildPrompt(input: GenerateReplyInput): string {
  const topics = input.topics.length > 0 ? input.topics.join(", ") : "None established yet";

  return [
    PERSONA,
    "",
    "Current conversation context:",
    formatPriorContext(input.priorMessages),
    "",
    `Current topics of focus: ${topics}`,
    "",
    `User: ${input.message}`,
    "",
    "Respond naturally and helpfully. If the user is exploring ideas, suggest relevant directions. If they're seeking summaries or insights, provide clear analysis.",
  ].join("\n");
}

export class PlaceholderResponseGenerator implements ResponseGenerator {
  async generate(input: GenerateReplyInput): Promise<string> {
    const prompt = buildPrompt(input);
    log.debug("Prompt built for placeholder generator", {
      promptLength: prompt.length,
      priorMessages: input.priorMessages.length,
    });

    let reply = `I understand you're interested in ${input.message.slice(0, 50)}... Let me help you explore this further. `;
    if (input.topics.length > 0) {
      reply += `Based on our conversation about ${input.topics.slice(0, 2).join(", ")}, I can suggest some related ideas.`;
    } else {
      reply += "What specific aspects would you like to explore?";
    }
    return reply;
  }
}

export class NoopIdeaSearcher implements IdeaSearcher {
  async search(topics: string[], session: ChatSession): Promise<IdeaSuggestion[]> {
    log.debug("Idea search requested", { sessionId: session.id, topics });
    return [];
  }
}

/**
 * Suggests stored ideas mentioning any discussed topic, best composite first
 */
export class StoreIdeaSearcher implements IdeaSearcher {
  constructor(
    private readonly store: IdeaStore,
    private readonly limit: number = MAX_IDEA_SUGGESTIONS
  ) {}

  async search(topics: string[], session: ChatSession): Promise<IdeaSuggestion[]> {
    const needles = topics.map((t) => t.toLowerCase());
    if (needles.length === 0) return [];

    const matches = this.store.list().filter(({ idea }) => {
      const haystack = `${idea.title} ${idea.content} ${idea.tags.join(" ")}`.toLowerCase();
      return needles.some((needle) => haystack.includes(needle));
    });

    matches.sort((a, b) => b.score.composite - a.score.composite);

    const suggestions = matches.slice(0, this.limit).map(({ idea, score }) => ({
      ideaId: idea.id,
      title: idea.title,
      summary: truncate(idea.content, 200),
      score: score.composite,
      sourceUrl: idea.sourceUrl,
    }));

    log.debug("Idea search completed", { sessionId: session.id, topics, found: suggestions.length });
    return suggestions;
  }
}
