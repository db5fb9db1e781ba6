import { v7 as uuidv7 } from "uuid";
import type { DB } from "../database.js";
import type { Article } from "../db/schema/index.js";
import { AggregatorError, DuplicateLinkError, StoreAccessError } from "../errors.js";
import type { CandidateArticle } from "../schemas/article.js";
import type { DedupeResult, IngestReport } from "../schemas/ingest.js";
import { insertArticle } from "./article-service.js";

/**
 * Keeps the first candidate for each link, in batch order. Later candidates
 * with the same link are dropped even when their other fields differ.
 */
export function dedupeByLink(batch: readonly CandidateArticle[]): DedupeResult {
  const seen = new Set<string>();
  const accepted: CandidateArticle[] = [];
  const dropped: CandidateArticle[] = [];

  for (const candidate of batch) {
    if (seen.has(candidate.link)) {
      dropped.push(candidate);
      continue;
    }
    seen.add(candidate.link);
    accepted.push(candidate);
  }

  return { accepted, dropped };
}

export function newArticleId(): string {
  return uuidv7();
}

function toArticle(candidate: CandidateArticle, id: string): Article {
  return {
    id,
    title: candidate.title,
    summary: candidate.summary,
    link: candidate.link,
    source: candidate.source,
    publishedDate: candidate.published_date,
  };
}

export async function ingestArticles(
  db: DB,
  batch: readonly CandidateArticle[],
): Promise<IngestReport> {
  if (batch.length === 0) {
    return { attempted: 0, inserted: 0, duplicates: 0 };
  }

  const { accepted, dropped } = dedupeByLink(batch);
  const rows = accepted.map((candidate) => toArticle(candidate, newArticleId()));

  // Any failure other than a duplicate link rolls the whole batch back
  const { inserted, conflicts } = await db
    .transaction(async (tx) => {
      let inserted = 0;
      let conflicts = 0;
      for (const row of rows) {
        try {
          await insertArticle(tx, row);
          inserted++;
        } catch (err) {
          if (!(err instanceof DuplicateLinkError)) throw err;
          conflicts++;
        }
      }
      return { inserted, conflicts };
    })
    .catch((err: unknown) => {
      if (err instanceof AggregatorError) throw err;
      throw new StoreAccessError("Ingestion transaction failed", { cause: err });
    });

  return {
    attempted: batch.length,
    inserted,
    duplicates: dropped.length + conflicts,
  };
}
