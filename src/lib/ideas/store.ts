/**
 * Idea store
 * In-memory registry of scored ideas and review decisions.
 * Process-lifetime only; swap the interface for a durable backend later.
 */

import type { IdeaDecision, ScoredIdea } from "../model";

export interface IdeaStore {
  save(entry: ScoredIdea): void;
  get(ideaId: string): ScoredIdea | undefined;
  list(): ScoredIdea[];
  recordDecision(decision: IdeaDecision): void;
  getDecision(ideaId: string): IdeaDecision | undefined;
}

export class InMemoryIdeaStore implements IdeaStore {
  private readonly ideas = new Map<string, ScoredIdea>();
  private readonly decisions = new Map<string, IdeaDecision>();

  save(entry: ScoredIdea): void {
    this.ideas.set(entry.idea.id, entry);
  }

  get(ideaId: string): ScoredIdea | undefined {
    return this.ideas.get(ideaId);
  }

  list(): ScoredIdea[] {
    return Array.from(this.ideas.values());
  }

  recordDecision(decision: IdeaDecision): void {
    this.decisions.set(decision.ideaId, { ...decision });
  }

  getDecision(ideaId: string): IdeaDecision | undefined {
    const decision = this.decisions.get(ideaId);
    return decision ? { ...decision } : undefined;
  }
}
