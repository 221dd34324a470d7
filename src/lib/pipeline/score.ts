/**
 * Idea scoring
 * Composite = relevance × w_r + novelty × w_n + topicality × w_t.
 * The composite is not clamped, so weights summing above 1 can push it past 1.
 */

import type { Idea, IdeaScore, TopicsConfig } from "../model";
import { createLogger } from "../logger";
import { computeRelevance } from "./relevance";
import { createPlaceholderEstimators, type Estimators } from "./estimators";

const log = createLogger("scoring");

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export async function scoreIdea(
  idea: Idea,
  config: TopicsConfig,
  estimators: Estimators = createPlaceholderEstimators()
): Promise<IdeaScore> {
  const breakdown = computeRelevance(idea, config);

  if (breakdown.excludedKeyword) {
    log.debug("Idea contains excluded topic", { ideaId: idea.id, excludedTopic: breakdown.excludedKeyword });
  } else {
    log.debug("Relevance calculated", {
      ideaId: idea.id,
      relevance: breakdown.relevance,
      primaryMatches: breakdown.primaryMatches,
      secondaryMatches: breakdown.secondaryMatches,
    });
  }

  const novelty = clampUnit(await estimators.novelty.estimate(idea));
  const topicality = clampUnit(await estimators.topicality.estimate(idea));
  const { relevanceWeight, noveltyWeight, topicalityWeight } = config.scoring;

  const composite =
    breakdown.relevance * relevanceWeight + novelty * noveltyWeight + topicality * topicalityWeight;

  return Object.freeze({
    ideaId: idea.id,
    relevance: breakdown.relevance,
    novelty,
    topicality,
    composite,
    createdAt: new Date(),
  });
}

export function passesThreshold(score: Pick<IdeaScore, "composite">, config: Pick<TopicsConfig, "scoring">): boolean {
  return score.composite >= config.scoring.minimumScore;
}

/**
 * Scorer bound to one configuration and estimator pair
 */
export class IdeaScorer {
  constructor(
    readonly config: TopicsConfig,
    private readonly estimators: Estimators = createPlaceholderEstimators()
  ) {}

  async score(idea: Idea): Promise<IdeaScore> {
    log.info("Scoring idea", { ideaId: idea.id, title: idea.title });

    const score = await scoreIdea(idea, this.config, this.estimators);

    log.info("Idea scored", {
      ideaId: idea.id,
      composite: Number(score.composite.toFixed(4)),
      relevance: Number(score.relevance.toFixed(4)),
      novelty: score.novelty,
      topicality: score.topicality,
    });

    return score;
  }

  passesThreshold(score: IdeaScore): boolean {
    const passes = passesThreshold(score, this.config);
    log.debug("Threshold check", {
      ideaId: score.ideaId,
      composite: score.composite,
      minimumScore: this.config.scoring.minimumScore,
      passes,
    });
    return passes;
  }
}
