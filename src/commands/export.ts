import type { DB } from "../database.js";
import type { ArticleFilter } from "../schemas/article.js";
import { DEFAULT_EXPORT_FORMAT, type ExportResult } from "../schemas/export.js";
import { listArticles } from "../services/article-service.js";
import { exportArticles, parseExportFormat } from "../services/export-service.js";

export interface ExportOptions extends ArticleFilter {
  format?: string;
}

export async function runExport(
  db: DB,
  outputFile: string,
  options: ExportOptions = {},
): Promise<ExportResult> {
  console.log("--- Running EXPORT command ---");

  const { format = DEFAULT_EXPORT_FORMAT, ...filter } = options;
  // Reject the format before touching the store
  const target = parseExportFormat(format);

  const records = await listArticles(db, filter);
  if (records.length === 0) {
    console.log("Query returned no results. Nothing exported.");
    return { written: false, count: 0 };
  }

  return exportArticles(records, outputFile, target);
}
