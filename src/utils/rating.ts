import type { Repositories } from "../repositories/types";

/** Arithmetic mean of the ratings; exactly 0 for none. */
export function averageRating(ratings: readonly number[]): number {
  if (ratings.length === 0) return 0;
  let sum = 0;
  for (const r of ratings) sum += r;
  return sum / ratings.length;
}

/**
 * Re-derives an idea's avgRating from all of its reviews and stores it.
 * Call inside the same transaction that inserted or removed the review.
 */
export async function recomputeAverage(repos: Repositories, ideaId: string): Promise<number> {
  const reviews = await repos.reviews.listByIdea(ideaId);
  const avgRating = averageRating(reviews.map((r) => r.rating));
  await repos.ideas.update(ideaId, { avgRating });
  return avgRating;
}
