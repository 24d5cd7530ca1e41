import fs from "fs";
import path from "path";
import { logger } from "../logger";
import { ArticleRecord } from "../interfaces/article";
import { MaterializeResult } from "../interfaces/pipeline";
import { CsvValue, toCsv } from "../utils/csv";

export const CSV_HEADER = [
  "publication_date",
  "title",
  "url",
  "domain",
  "language",
  "source_country",
  "relevance_score",
  "category",
] as const;

type CsvRow = Record<(typeof CSV_HEADER)[number], CsvValue>;

/**
 * Drops records whose (title, url) pair was already seen.
 * The first occurrence wins.
 */
export function dedupeArticles(records: ArticleRecord[]): ArticleRecord[] {
  const seen = new Set<string>();

  return records.filter(record => {
    const key = JSON.stringify([record.title, record.url]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Ascending by the raw provider timestamp, compared as plain strings.
 * Records without a timestamp go last.
 */
export function sortByPublicationDate(records: ArticleRecord[]): ArticleRecord[] {
  return [...records].sort((a, b) => {
    if (a.publicationDate === b.publicationDate) return 0;
    if (a.publicationDate === null) return 1;
    if (b.publicationDate === null) return -1;
    return a.publicationDate < b.publicationDate ? -1 : 1;
  });
}

function toRow(record: ArticleRecord): CsvRow {
  return {
    publication_date: record.publicationDate,
    title: record.title,
    url: record.url,
    domain: record.domain,
    language: record.language,
    source_country: record.sourceCountry,
    relevance_score: record.relevanceScore,
    category: record.category,
  };
}

export function articlesToCsv(records: ArticleRecord[]): string {
  return toCsv(CSV_HEADER, records.map(toRow), { bom: true });
}

export function materializeArticles(
  records: ArticleRecord[],
  outputFile: string
): MaterializeResult {
  if (records.length === 0) {
    logger.warn("No articles fetched.");
    return { written: false };
  }

  const rows = sortByPublicationDate(dedupeArticles(records));

  fs.mkdirSync(path.dirname(path.resolve(outputFile)), { recursive: true });
  fs.writeFileSync(outputFile, articlesToCsv(rows), "utf8");

  logger.info(
    { outputFile, rows: rows.length, duplicates: records.length - rows.length },
    "Articles written"
  );
  return { written: true, rows: rows.length, outputFile };
}
