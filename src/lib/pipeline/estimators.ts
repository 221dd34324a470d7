/**
 * Novelty and topicality estimators
 *
 * Neither signal is computed yet: novelty needs a semantic-similarity search
 * over previously seen ideas, topicality needs recency/trend analysis. The
 * placeholders return fixed values so the composite formula stays complete
 * and a real estimator can be swapped in without touching the scorer.
 */

import type { Idea } from "../model";

export interface NoveltyEstimator {
  readonly name: string;
  estimate(idea: Idea): number | Promise<number>;
}

export interface TopicalityEstimator {
  readonly name: string;
  estimate(idea: Idea): number | Promise<number>;
}

export const PLACEHOLDER_NOVELTY = 0.8;
export const PLACEHOLDER_TOPICALITY = 0.7;

export class PlaceholderNoveltyEstimator implements NoveltyEstimator {
  readonly name = "placeholder-novelty";

  estimate(): number {
    return PLACEHOLDER_NOVELTY;
  }
}

export class PlaceholderTopicalityEstimator implements TopicalityEstimator {
  readonly name = "placeholder-topicality";

  estimate(): number {
    return PLACEHOLDER_TOPICALITY;
  }
}

export interface Estimators {
  novelty: NoveltyEstimator;
  topicality: TopicalityEstimator;
}

export function createPlaceholderEstimators(): Estimators {
  return {
    novelty: new PlaceholderNoveltyEstimator(),
    topicality: new PlaceholderTopicalityEstimator(),
  };
}
