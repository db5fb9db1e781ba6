export { articles } from "./articles.js";
export type { Article, NewArticle } from "./articles.js";
