import type { DB } from "../database.js";
import type { IngestReport } from "../schemas/ingest.js";
import { ingestArticles } from "../services/ingest-service.js";
import { fetchMockArticles } from "../services/mock-feed.js";

export interface FetchOptions {
  source?: string;
}

export async function runFetch(db: DB, options: FetchOptions = {}): Promise<IngestReport> {
  console.log("--- Running FETCH command ---");
  console.log("NOTE: Using mock data; no network news source is configured.");

  const batch = fetchMockArticles(options.source);
  if (batch.length === 0) {
    console.log("No articles to save.");
  }

  const report = await ingestArticles(db, batch);

  console.log("--- Save Results ---");
  console.log(`Total processed: ${report.attempted}`);
  console.log(`New articles inserted: ${report.inserted}`);
  console.log(`Skipped as duplicates (in batch or DB): ${report.duplicates}`);
  console.log("FETCH complete.");

  return report;
}
