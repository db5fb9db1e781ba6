import { date, index, pgTable, text, uuid } from "drizzle-orm/pg-core";

export const articles = pgTable(
  "articles",
  {
    id: uuid("id").primaryKey(),
    title: text("title").notNull(),
    summary: text("summary"),
    link: text("link").notNull().unique(),
    source: text("source").notNull(),
    publishedDate: date("published_date", { mode: "string" }).notNull(),
  },
  (table) => [index("ix_articles_published_date").on(table.publishedDate)],
);

export type Article = typeof articles.$inferSelect;
export type NewArticle = typeof articles.$inferInsert;
