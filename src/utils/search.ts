import type { IdeaRecord } from "../domain/types";

export interface SearchCriteria {
  keyword?: string;
  /** comma-separated; any one match is enough */
  tags?: string;
  minRating?: number;
}

export function parseTags(csv: string | undefined | null): string[] {
  if (!csv) return [];
  return csv
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
}

type Searchable = Pick<IdeaRecord, "title" | "description" | "tags" | "avgRating">;

export function matchesCriteria(idea: Searchable, criteria: SearchCriteria): boolean {
  const keyword = (criteria.keyword ?? "").toLowerCase();
  if (keyword && !`${idea.title} ${idea.description}`.toLowerCase().includes(keyword)) {
    return false;
  }

  if (idea.avgRating < (criteria.minRating ?? 0)) return false;

  const wanted = parseTags(criteria.tags);
  if (wanted.length > 0) {
    const own = new Set(parseTags(idea.tags));
    if (!wanted.some((t) => own.has(t))) return false;
  }
  return true;
}

/** Lazily yields the matching ideas in their input order. */
export function* searchIdeas<T extends Searchable>(ideas: Iterable<T>, criteria: SearchCriteria = {}): Generator<T> {
  for (const idea of ideas) {
    if (matchesCriteria(idea, criteria)) yield idea;
  }
}
