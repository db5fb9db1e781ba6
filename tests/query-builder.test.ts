import { describe, it, expect } from "vitest";
import { PgDialect } from "drizzle-orm/pg-core";
import { InvalidDateError } from "../src/errors.js";
import type { ArticleFilter } from "../src/schemas/article.js";
import {
  buildArticleQuery,
  escapeLikePattern,
  parseFilterDate,
} from "../src/services/query-builder.js";

const dialect = new PgDialect();

function paramsOf(filter: ArticleFilter): unknown[] {
  const { where } = buildArticleQuery(filter);
  return where ? dialect.sqlToQuery(where).params : [];
}

describe("buildArticleQuery", () => {
  it("should match everything when no filter is set", () => {
    const query = buildArticleQuery({});
    expect(query.where).toBeUndefined();
    expect(query.warnings).toEqual([]);
    expect(query.orderBy).toHaveLength(2);
  });

  it("should treat blank patterns as absent", () => {
    expect(buildArticleQuery({ source: "   ", keyword: "" }).where).toBeUndefined();
  });

  it("should bind the source as a substring pattern", () => {
    expect(paramsOf({ source: "Tech" })).toEqual(["%Tech%"]);
  });

  it("should bind the keyword once for title and once for summary", () => {
    expect(paramsOf({ keyword: "AI" })).toEqual(["%AI%", "%AI%"]);
  });

  it("should bind a valid date as an exact match", () => {
    expect(paramsOf({ date: "2024-02-29" })).toEqual(["2024-02-29"]);
  });

  it("should combine all filters in order", () => {
    expect(paramsOf({ source: "Tech", keyword: "AI", date: "2024-05-01" })).toEqual([
      "%Tech%",
      "%AI%",
      "%AI%",
      "2024-05-01",
    ]);
  });

  it("should drop an invalid date and warn", () => {
    const query = buildArticleQuery({ date: "2024-13-40" });
    expect(query.where).toBeUndefined();
    expect(query.warnings).toEqual([
      "Invalid date format provided: 2024-13-40. Required format is YYYY-MM-DD. Ignoring date filter.",
    ]);
  });

  it("should keep the other filters when the date is invalid", () => {
    expect(paramsOf({ source: "Tech", date: "yesterday" })).toEqual(["%Tech%"]);
  });

  it("should escape LIKE metacharacters", () => {
    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
    expect(paramsOf({ keyword: "100%" })).toEqual(["%100\\%%", "%100\\%%"]);
  });
});

describe("parseFilterDate", () => {
  it("should accept real calendar days", () => {
    expect(parseFilterDate("2024-02-29")).toBe("2024-02-29");
    expect(parseFilterDate("2026-12-31")).toBe("2026-12-31");
  });

  it("should keep two-digit years as written", () => {
    expect(parseFilterDate("0024-01-01")).toBe("0024-01-01");
    expect(parseFilterDate("0024-02-29")).toBe("0024-02-29");
    expect(() => parseFilterDate("0023-02-29")).toThrow(InvalidDateError);
  });

  it.each(["2023-02-29", "2024-13-40", "2024-04-31", "2024-1-5", "20240105", "0000-01-01", ""])(
    "should reject %j",
    (value) => {
      expect(() => parseFilterDate(value)).toThrow(InvalidDateError);
    },
  );
});
