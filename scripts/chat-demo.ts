/**
 * Scripted conversation against the placeholder generator
 */

import path from "path";
import dotenv from "dotenv";
import { createIdeaScout } from "../src/index";
import { logger } from "../src/lib/logger";

// .env.local wins over .env; dotenv never overrides variables already set
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config();

const TURNS = [
  "What is happening with tokenized deposits at large banks?",
  "How does that compare to stablecoin treasury management?",
  "Any ideas for a piece on liquidity in digital commerce?",
];

async function main() {
  const scout = createIdeaScout();
  let sessionId: string | undefined;

  for (const message of TURNS) {
    const response = await scout.chat.sendMessage({ message, sessionId, includeIdeas: true });
    sessionId = response.sessionId;

    console.log(`\nUser: ${message}`);
    console.log(`Scout: ${response.content}`);
    console.log(
      `  topics=${response.topicsDiscussed.join(", ") || "none"} confidence=${response.contextConfidence} latency=${response.latencyMs}ms`
    );
  }

  if (sessionId) {
    const history = scout.chat.getHistory(sessionId);
    console.log(`\nSession ${sessionId}: ${history?.messages.length ?? 0} messages, topics: ${history?.session.topics.join(", ")}\n`);
    await scout.chat.closeSession(sessionId);
  }
}

main().catch((error) => {
  logger.error("Demo failed", error);
  process.exit(1);
});
