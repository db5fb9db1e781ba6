import type { DB } from "../database.js";
import type { Article } from "../db/schema/index.js";
import type { ArticleFilter } from "../schemas/article.js";
import { listArticles } from "../services/article-service.js";
import { renderArticleTable } from "../services/export-service.js";

export async function runQuery(db: DB, filter: ArticleFilter = {}): Promise<Article[]> {
  console.log("--- Running QUERY command ---");

  const records = await listArticles(db, filter);
  if (records.length === 0) {
    console.log("Query returned no results.");
    return records;
  }

  console.log(`Found ${records.length} articles matching criteria:`);
  console.log(renderArticleTable(records));
  return records;
}
