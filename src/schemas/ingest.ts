import type { CandidateArticle } from "./article.js";

export interface IngestReport {
  /** Candidates received, before in-batch deduplication. */
  attempted: number;
  inserted: number;
  /** In-batch drops plus links already present in the store. */
  duplicates: number;
}

export interface DedupeResult {
  accepted: CandidateArticle[];
  dropped: CandidateArticle[];
}
