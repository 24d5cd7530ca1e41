import { ArticleRecord, Category } from "./article";

/**
 * One-day search bounds. Both values are UTC calendar days.
 */
export interface QueryWindow {
  start: Date;
  end: Date;
}

export interface SearchProfile {
  name: string;
  companyQuery: string;
  sectorQuery: string;
  keywords: readonly string[];
}

export interface PipelineConfig {
  startDate: Date;
  endDate: Date;
  outputFile: string;
  requestDelayMs: number;
  minRequestIntervalMs: number;
  requestTimeoutMs: number;
  baseUrl: string;
  maxRecords: number;
  limits: Readonly<Record<Category, number>>;
  profile: SearchProfile;
}

export interface CollectionResult {
  articles: ArticleRecord[];
  totals: Record<Category, number>;
  days: number;
  failedCalls: number;
}

export type MaterializeResult =
  | { written: false }
  | { written: true; rows: number; outputFile: string };
