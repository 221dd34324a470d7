/**
 * Chat configuration
 * Context window bounds, confidence defaults and the topic vocabulary
 * used to tag user messages
 */

export const DEFAULT_CONTEXT_WINDOW = 10;
export const MAX_CONTEXT_WINDOW = 50;
export const MAX_MESSAGE_LENGTH = 10_000;

// Confidence a new session starts with, before any turn resolves one
export const INITIAL_SESSION_CONFIDENCE = 0.5;

// Confidence a turn resolves to when no context retriever is configured
export const DEFAULT_TURN_CONFIDENCE = 0.8;

export const MAX_IDEA_SUGGESTIONS = 5;

/**
 * Fixed vocabulary matched against user messages (case-insensitive substring).
 * Independent of the scoring topic configuration.
 */
export const TOPIC_VOCABULARY: readonly string[] = [
  "AI",
  "technology",
  "business",
  "liquidity",
  "tokenized",
  "stablecoin",
  "deposits",
  "treasury",
  "commerce",
];
