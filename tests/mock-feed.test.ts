import { describe, it, expect } from "vitest";
import { candidateBatchSchema } from "../src/schemas/article.js";
import { fetchMockArticles } from "../src/services/mock-feed.js";

const NOW = new Date(2026, 0, 15, 9, 30);

describe("fetchMockArticles", () => {
  it("should return a valid batch dated today and yesterday", () => {
    const batch = fetchMockArticles(undefined, NOW);

    expect(batch).toHaveLength(5);
    expect(candidateBatchSchema.safeParse(batch).success).toBe(true);
    expect(new Set(batch.map((a) => a.published_date))).toEqual(
      new Set(["2026-01-15", "2026-01-14"]),
    );
  });

  it("should include a syndicated copy under a second link", () => {
    const batch = fetchMockArticles(undefined, NOW);

    const titles = batch.map((a) => a.title);
    expect(new Set(titles).size).toBe(4);
    expect(new Set(batch.map((a) => a.link)).size).toBe(5);
  });

  it("should filter sources by case-insensitive substring", () => {
    const tech = fetchMockArticles("tech", NOW);
    expect(tech).toHaveLength(3);
    expect(tech.every((a) => a.source === "Tech Weekly")).toBe(true);

    expect(fetchMockArticles("POLICY", NOW).map((a) => a.source)).toEqual(["Policy Hub"]);
    expect(fetchMockArticles("Nowhere Times", NOW)).toEqual([]);
  });

  it("should date yesterday across a month boundary", () => {
    const batch = fetchMockArticles("tech", new Date(2026, 2, 1, 8, 0));
    expect(batch.map((a) => a.published_date)).toEqual(["2026-03-01", "2026-02-28", "2026-03-01"]);
  });
});
