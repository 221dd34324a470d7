/**
 * Chat collaborator contracts
 */

import type { ChatMessage, ChatSession, IdeaSuggestion } from "../model";

export interface GenerateReplyInput {
  priorMessages: ChatMessage[];
  message: string;
  topics: string[];
}

export interface ResponseGenerator {
  generate(input: GenerateReplyInput): Promise<string>;
}

export type ContextOutcome =
  | { available: true; confidence: number; context?: string }
  | { available: false; reason: string };

/**
 * Optional source of conversational context. Unavailability is never fatal.
 */
export interface ContextRetriever {
  retrieve(query: string, session: ChatSession): Promise<ContextOutcome>;
}

export interface IdeaSearcher {
  search(topics: string[], session: ChatSession): Promise<IdeaSuggestion[]>;
}
