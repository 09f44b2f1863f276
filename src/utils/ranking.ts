import type { IdeaRecord } from "../domain/types";

export const PRIORITY_BOOST = 100;
export const RATING_WEIGHT = 10;

type Scored = Pick<IdeaRecord, "priority" | "avgRating" | "upvotes">;

export function scoreIdea(idea: Scored): number {
  return (idea.priority ? PRIORITY_BOOST : 0) + RATING_WEIGHT * idea.avgRating + idea.upvotes;
}

/**
 * Highest score first. Equal scores keep their input order (Array#sort is
 * stable); there is no secondary key.
 */
export function rankIdeas<T extends Scored>(ideas: Iterable<T>): T[] {
  return Array.from(ideas, (idea) => ({ idea, score: scoreIdea(idea) }))
    .sort((a, b) => b.score - a.score)
    .map((e) => e.idea);
}
