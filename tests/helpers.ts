import { vi } from "vitest";
import type { Article } from "../src/db/schema/index.js";
import type { CandidateArticle } from "../src/schemas/article.js";
import { newArticleId } from "../src/services/ingest-service.js";

export function makeCandidate(overrides: Partial<CandidateArticle> = {}): CandidateArticle {
  return {
    title: "Test Title",
    summary: "Test summary",
    link: `https://example.com/${newArticleId()}`,
    source: "TestSource",
    published_date: "2026-01-15",
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: newArticleId(),
    title: "Test Title",
    summary: "Test summary",
    link: `https://example.com/${newArticleId()}`,
    source: "TestSource",
    publishedDate: "2026-01-15",
    ...overrides,
  };
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}
