import { type SQL, and, asc, desc, eq, ilike, or } from "drizzle-orm";
import { articles } from "../db/schema/index.js";
import { InvalidDateError } from "../errors.js";
import type { ArticleFilter } from "../schemas/article.js";
import { isoDateSchema } from "../schemas/base.js";

export interface ArticleQuery {
  /** Undefined when no filter applies, matching every article. */
  where: SQL | undefined;
  orderBy: SQL[];
  warnings: string[];
}

// Newest first; uuidv7 ids keep insertion order within a day.
const ARTICLE_ORDER: SQL[] = [desc(articles.publishedDate), asc(articles.id)];

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function containsPattern(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

function presentPattern(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

export function parseFilterDate(value: string): string {
  const result = isoDateSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidDateError(value);
  }
  return result.data;
}

export function buildArticleQuery(filter: ArticleFilter): ArticleQuery {
  const conditions: SQL[] = [];
  const warnings: string[] = [];

  const source = presentPattern(filter.source);
  if (source) {
    conditions.push(ilike(articles.source, containsPattern(source)));
  }

  const keyword = presentPattern(filter.keyword);
  if (keyword) {
    const pattern = containsPattern(keyword);
    const match = or(ilike(articles.title, pattern), ilike(articles.summary, pattern));
    if (match) conditions.push(match);
  }

  if (filter.date) {
    try {
      conditions.push(eq(articles.publishedDate, parseFilterDate(filter.date)));
    } catch (err) {
      if (!(err instanceof InvalidDateError)) throw err;
      // A bad date widens the query instead of failing it
      warnings.push(err.message);
    }
  }

  return {
    where: conditions.length > 0 ? and(...conditions) : undefined,
    orderBy: ARTICLE_ORDER,
    warnings,
  };
}
