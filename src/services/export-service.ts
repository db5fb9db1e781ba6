import { rename, rm, writeFile } from "node:fs/promises";
import { stringify } from "csv-stringify/sync";
import ExcelJS from "exceljs";
import type { Article } from "../db/schema/index.js";
import { ExportError, UnsupportedFormatError } from "../errors.js";
import { ARTICLE_VIEW_COLUMNS, type ArticleView } from "../schemas/article.js";
import { type ExportFormat, type ExportResult, exportFormatSchema } from "../schemas/export.js";

const FORMAT_LABELS: Record<ExportFormat, string> = {
  csv: "CSV",
  excel: "Excel",
  json: "JSON",
};

const COLUMN_GAP = "  ";

/** Drops the store-internal id. */
export function toArticleView(article: Article): ArticleView {
  return {
    title: article.title,
    summary: article.summary,
    link: article.link,
    source: article.source,
    published_date: article.publishedDate,
  };
}

export function parseExportFormat(format: string): ExportFormat {
  const result = exportFormatSchema.safeParse(format);
  if (!result.success) {
    throw new UnsupportedFormatError(format);
  }
  return result.data;
}

/**
 * Left-aligned columns, one line per article in the order given.
 */
export function renderArticleTable(records: readonly Article[]): string {
  const rows = records.map((record) => {
    const view = toArticleView(record);
    return ARTICLE_VIEW_COLUMNS.map((column) => view[column] ?? "");
  });
  const header: string[] = [...ARTICLE_VIEW_COLUMNS];

  const widths = header.map((name) => name.length);
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i], cell.length);
    });
  }

  return [header, ...rows]
    .map((cells) =>
      cells
        .map((cell, i) => cell.padEnd(widths[i]))
        .join(COLUMN_GAP)
        .trimEnd(),
    )
    .join("\n");
}

async function toWorkbook(views: ArticleView[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Sheet1");
  sheet.columns = ARTICLE_VIEW_COLUMNS.map((column) => ({ header: column, key: column }));
  for (const view of views) {
    sheet.addRow(view);
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export async function serializeArticles(
  records: readonly Article[],
  format: string,
): Promise<Buffer> {
  const target = parseExportFormat(format);
  const views = records.map(toArticleView);

  switch (target) {
    case "csv":
      return Buffer.from(stringify(views, { header: true, columns: [...ARTICLE_VIEW_COLUMNS] }));
    case "excel":
      return toWorkbook(views);
    case "json":
      return Buffer.from(JSON.stringify(views, null, 4));
  }
}

/**
 * Writes `records` to `outputFile`. The payload is fully encoded first and
 * moved into place with a rename, so a failure never leaves a partial file.
 */
export async function exportArticles(
  records: readonly Article[],
  outputFile: string,
  format: string,
): Promise<ExportResult> {
  const target = parseExportFormat(format);

  if (records.length === 0) {
    console.log("No results to export.");
    return { written: false, count: 0 };
  }

  const payload = await serializeArticles(records, target);

  console.log(`Exporting ${records.length} articles to ${outputFile}...`);

  const tempFile = `${outputFile}.${process.pid}.tmp`;
  try {
    await writeFile(tempFile, payload);
    await rename(tempFile, outputFile);
  } catch (err) {
    await rm(tempFile, { force: true });
    throw new ExportError(`Could not write ${outputFile}`, { cause: err });
  }

  console.log(`Successfully exported to ${FORMAT_LABELS[target]}: ${outputFile}`);
  return { written: true, count: records.length };
}
