/**
 * Score a manual idea
 * Usage: tsx scripts/score-idea.ts <file.txt> [title]
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { createIdeaScout } from "../src/index";
import { computeRelevance } from "../src/lib/pipeline/relevance";
import { logger } from "../src/lib/logger";

// .env.local wins over .env; dotenv never overrides variables already set
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config();

async function main() {
  const [file, titleArg] = process.argv.slice(2);
  if (!file) {
    console.error("Usage: tsx scripts/score-idea.ts <file.txt> [title]");
    process.exit(1);
  }

  const content = fs.readFileSync(path.resolve(process.cwd(), file), "utf-8");
  const title = titleArg ?? path.basename(file, path.extname(file));

  const scout = createIdeaScout();
  const { idea, score, passesThreshold, filterResult } = await scout.ideas.createManualIdea({ title, content });
  const breakdown = computeRelevance(idea, scout.config);

  console.log(`\n=== ${idea.title} ===\n`);
  console.log(`  Relevance:  ${score.relevance.toFixed(3)}`);
  console.log(`    primary:   ${breakdown.primaryMatches.join(", ") || "none"}`);
  console.log(`    secondary: ${breakdown.secondaryMatches.join(", ") || "none"}`);
  if (breakdown.excludedKeyword) {
    console.log(`    excluded by: ${breakdown.excludedKeyword}`);
  }
  console.log(`  Novelty:    ${score.novelty.toFixed(3)}`);
  console.log(`  Topicality: ${score.topicality.toFixed(3)}`);
  console.log(`  Composite:  ${score.composite.toFixed(3)} (minimum ${scout.config.scoring.minimumScore})`);
  console.log(`  Passes:     ${passesThreshold ? "yes" : "no"}`);
  console.log(`  Filters:    ${filterResult.passed ? "ok" : filterResult.reasons.join(", ")}\n`);
}

main().catch((error) => {
  logger.error("Scoring failed", error);
  process.exit(1);
});
