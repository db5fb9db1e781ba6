import { z } from "zod";
import { isoDateSchema } from "./base.js";

export const candidateArticleSchema = z
  .object({
    title: z.string().min(1).max(500),
    summary: z.string().max(5000).nullable(),
    link: z.string().min(1).max(2083),
    source: z.string().min(1).max(200),
    published_date: isoDateSchema,
  })
  .strict();

export type CandidateArticle = z.infer<typeof candidateArticleSchema>;

export const candidateBatchSchema = z.array(candidateArticleSchema);

export interface ArticleFilter {
  source?: string;
  keyword?: string;
  date?: string;
}

/** The user-visible projection of a stored article. */
export interface ArticleView {
  title: string;
  summary: string | null;
  link: string;
  source: string;
  published_date: string;
}

export const ARTICLE_VIEW_COLUMNS = [
  "title",
  "summary",
  "link",
  "source",
  "published_date",
] as const satisfies readonly (keyof ArticleView)[];
