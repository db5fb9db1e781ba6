import { sql } from "drizzle-orm";
import type { DB } from "../database.js";
import { type Article, articles } from "../db/schema/index.js";
import { DuplicateLinkError, StoreAccessError } from "../errors.js";
import type { ArticleFilter } from "../schemas/article.js";
import { buildArticleQuery } from "./query-builder.js";

export async function initializeStore(db: DB): Promise<void> {
  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS articles (
        id UUID PRIMARY KEY,
        title TEXT NOT NULL,
        summary TEXT,
        link TEXT NOT NULL UNIQUE,
        source TEXT NOT NULL,
        published_date DATE NOT NULL
      )
    `);
    await db.execute(
      sql`CREATE INDEX IF NOT EXISTS ix_articles_published_date ON articles (published_date)`,
    );
  } catch (err) {
    throw new StoreAccessError("Could not initialize the article store", { cause: err });
  }
}

/**
 * Inserts one article. A link that is already stored raises
 * {@link DuplicateLinkError}; the conflict is resolved by the database
 * without aborting an enclosing transaction.
 */
export async function insertArticle(db: DB, article: Article): Promise<Article> {
  let rows: Article[];
  try {
    rows = await db
      .insert(articles)
      .values(article)
      .onConflictDoNothing({ target: articles.link })
      .returning();
  } catch (err) {
    throw new StoreAccessError(`Could not insert article '${article.link}'`, { cause: err });
  }

  const [inserted] = rows;
  if (!inserted) {
    throw new DuplicateLinkError(article.link);
  }
  return inserted;
}

export async function listArticles(db: DB, filter: ArticleFilter = {}): Promise<Article[]> {
  const { where, orderBy, warnings } = buildArticleQuery(filter);
  for (const warning of warnings) {
    console.warn(`Warning: ${warning}`);
  }

  try {
    return await db
      .select()
      .from(articles)
      .where(where)
      .orderBy(...orderBy);
  } catch (err) {
    throw new StoreAccessError("Database query failed", { cause: err });
  }
}
