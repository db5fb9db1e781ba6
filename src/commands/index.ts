export { type ExportOptions, runExport } from "./export.js";
export { type FetchOptions, runFetch } from "./fetch.js";
export { runQuery } from "./query.js";
