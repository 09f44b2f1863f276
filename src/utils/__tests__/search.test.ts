import { describe, it, expect } from "vitest";
import { matchesCriteria, parseTags, searchIdeas } from "../search";

const idea = (id: string, title: string, description: string, tags: string, avgRating = 0) => ({
  id,
  title,
  description,
  tags,
  avgRating,
});

const ideas = [
  idea("1", "Bike lanes downtown", "Protected lanes on Main St", "transport, safety", 4),
  idea("2", "Community garden", "Turn the vacant lot into a garden", "Green,Food", 2.5),
  idea("3", "Night buses", "Extend bus service past midnight", "transport", 0),
];

describe("parseTags", () => {
  it("splits, trims and lower-cases, dropping blanks", () => {
    expect(parseTags(" Transport , ,SAFETY,")).toEqual(["transport", "safety"]);
    expect(parseTags("")).toEqual([]);
    expect(parseTags(undefined)).toEqual([]);
  });
});

describe("searchIdeas", () => {
  it("returns every idea in order when no filter is given", () => {
    expect([...searchIdeas(ideas, { keyword: "", tags: "", minRating: 0 })].map((i) => i.id)).toEqual([
      "1",
      "2",
      "3",
    ]);
  });

  it("matches the keyword case-insensitively in title or description", () => {
    expect([...searchIdeas(ideas, { keyword: "GARDEN" })].map((i) => i.id)).toEqual(["2"]);
    expect([...searchIdeas(ideas, { keyword: "midnight" })].map((i) => i.id)).toEqual(["3"]);
  });

  it("matches across the title/description boundary", () => {
    expect([...searchIdeas(ideas, { keyword: "downtown protected" })].map((i) => i.id)).toEqual(["1"]);
  });

  it("keeps ideas sharing at least one requested tag", () => {
    expect([...searchIdeas(ideas, { tags: "food, transport" })].map((i) => i.id)).toEqual(["1", "2", "3"]);
    expect([...searchIdeas(ideas, { tags: " SAFETY " })].map((i) => i.id)).toEqual(["1"]);
    expect([...searchIdeas(ideas, { tags: "housing" })]).toEqual([]);
  });

  it("applies the minimum rating inclusively", () => {
    expect([...searchIdeas(ideas, { minRating: 2.5 })].map((i) => i.id)).toEqual(["1", "2"]);
  });

  it("combines all predicates", () => {
    expect(matchesCriteria(ideas[0], { keyword: "lanes", tags: "safety", minRating: 4 })).toBe(true);
    expect(matchesCriteria(ideas[0], { keyword: "lanes", tags: "food", minRating: 4 })).toBe(false);
  });

  it("is lazy", () => {
    const seen: string[] = [];
    function* source() {
      for (const i of ideas) {
        seen.push(i.id);
        yield i;
      }
    }
    const iter = searchIdeas(source(), { tags: "transport" });
    expect(iter.next().value?.id).toBe("1");
    expect(seen).toEqual(["1"]);
  });
});
