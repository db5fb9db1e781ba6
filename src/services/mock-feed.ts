import { type CandidateArticle, candidateBatchSchema } from "../schemas/article.js";
import { formatCalendarDate } from "../schemas/base.js";

interface FeedEntry {
  title: string;
  summary: string | null;
  link: string;
  source: string;
  daysAgo: number;
}

const FEED_ENTRIES: FeedEntry[] = [
  {
    title: "Open-weight language model tops reasoning benchmarks",
    summary: "A research lab released a model that outperforms larger rivals on maths tasks.",
    link: "https://tech-weekly.example.com/articles/open-weight-model",
    source: "Tech Weekly",
    daysAgo: 0,
  },
  {
    title: "Markets climb as chipmakers report record quarter",
    summary: "Semiconductor earnings lifted the main indices for a third straight session.",
    link: "https://finance-daily.example.com/markets/chipmakers-record-quarter",
    source: "Finance Daily",
    daysAgo: 0,
  },
  {
    title: "Inside the warehouse where robots pack every order",
    summary: "Automation is reshaping logistics floors faster than planners expected.",
    link: "https://tech-weekly.example.com/articles/warehouse-robots",
    source: "Tech Weekly",
    daysAgo: 1,
  },
  {
    title: "New grants aim to help small businesses go digital",
    summary: "The programme covers up to half the cost of software and training.",
    link: "https://policy-hub.example.com/news/small-business-grants",
    source: "Policy Hub",
    daysAgo: 0,
  },
  {
    // Same story syndicated under a second link
    title: "Open-weight language model tops reasoning benchmarks",
    summary: "A research lab released a model that outperforms larger rivals on maths tasks.",
    link: "https://tech-weekly.example.com/articles/open-weight-model-update",
    source: "Tech Weekly",
    daysAgo: 0,
  },
];

function daysBefore(now: Date, days: number): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);
}

/**
 * Stand-in for a network news source. With `sourceFilter`, only articles
 * whose source contains it (case-insensitive) are returned.
 */
export function fetchMockArticles(sourceFilter?: string, now = new Date()): CandidateArticle[] {
  const needle = sourceFilter?.trim().toLowerCase();

  const batch = FEED_ENTRIES.filter(
    (entry) => !needle || entry.source.toLowerCase().includes(needle),
  ).map(({ daysAgo, ...entry }) => ({
    ...entry,
    published_date: formatCalendarDate(daysBefore(now, daysAgo)),
  }));

  return candidateBatchSchema.parse(batch);
}
