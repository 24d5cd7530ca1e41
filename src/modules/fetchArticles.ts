import axios, { AxiosInstance, AxiosResponse } from "axios";
import Bottleneck from "bottleneck";
import { logger } from "../logger";
import { GdeltArticle, GdeltResponseSchema } from "../schemas/gdelt.schema";
import { FetchResult, ScoredArticle } from "../interfaces/article";
import { QueryWindow } from "../interfaces/pipeline";
import { GDELT_FORMAT, GDELT_MODE, GDELT_SORT } from "../constants/gdelt";
import { computeRelevance, createKeywordFilter } from "./relevance";
import { formatCompactDay, formatDay } from "../utils/time";

export type FetchArticlesDeps = {
  axiosClient: AxiosInstance;
  limiter: Bottleneck;
  keywords: readonly string[];
  baseUrl: string;
  maxRecords: number;
  timeoutMs: number;
};

export type ArticleFetcher = (query: string, window: QueryWindow) => Promise<FetchResult>;

export function buildSearchParams(query: string, window: QueryWindow, maxRecords: number) {
  return {
    query,
    mode: GDELT_MODE,
    maxrecords: maxRecords,
    format: GDELT_FORMAT,
    sort: GDELT_SORT,
    STARTDATETIME: `${formatCompactDay(window.start)}000000`,
    ENDDATETIME: `${formatCompactDay(window.end)}235959`,
  };
}

function bodySnippet(data: unknown): string {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? "";
  return text.slice(0, 100);
}

/**
 * Maps raw DOC API entries to scored articles, dropping titles that
 * miss every keyword and titles that score zero.
 */
export function selectRelevantArticles(
  raw: GdeltArticle[],
  keywords: readonly string[]
): ScoredArticle[] {
  const matchesKeyword = createKeywordFilter(keywords);
  const articles: ScoredArticle[] = [];

  for (const a of raw) {
    const title = a.title ?? "";
    if (!title || !matchesKeyword(title)) continue;

    const relevanceScore = computeRelevance(title, keywords);
    if (relevanceScore === 0) continue;

    articles.push({
      publicationDate: a.seendate ?? null,
      title,
      url: a.url ?? null,
      domain: a.domain ?? null,
      language: a.language ?? null,
      sourceCountry: a.sourcecountry ?? null,
      relevanceScore,
    });
  }

  return articles;
}

/**
 * Runs one date-bounded search. HTTP, transport and payload problems come
 * back as `{ ok: false }`; anything else is a bug and is thrown.
 */
export async function fetchArticles(
  query: string,
  window: QueryWindow,
  deps: FetchArticlesDeps
): Promise<FetchResult> {
  const { axiosClient, limiter, keywords, baseUrl, maxRecords, timeoutMs } = deps;
  const day = formatDay(window.start);

  let response: AxiosResponse<unknown>;
  try {
    response = await limiter.schedule(() =>
      axiosClient.get<unknown>(baseUrl, {
        timeout: timeoutMs,
        params: buildSearchParams(query, window, maxRecords),
        validateStatus: () => true,
      })
    );
  } catch (err) {
    if (!axios.isAxiosError(err)) throw err;

    logger.warn({ day, code: err.code, err: err.message }, "GDELT request failed");
    return { ok: false, reason: `request failed: ${err.message}` };
  }

  if (response.status !== 200) {
    const snippet = bodySnippet(response.data);
    logger.warn({ day, status: response.status, body: snippet }, "GDELT returned non-200 status");
    return { ok: false, status: response.status, reason: `HTTP ${response.status}: ${snippet}` };
  }

  const parsed = GdeltResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    logger.warn(
      { day, issues: parsed.error.issues, body: bodySnippet(response.data) },
      "GDELT response schema mismatch"
    );
    return { ok: false, reason: "GDELT_SCHEMA_MISMATCH" };
  }

  const raw = parsed.data.articles ?? [];
  const articles = selectRelevantArticles(raw, keywords);

  logger.debug({ day, received: raw.length, kept: articles.length }, "GDELT articles filtered");
  return { ok: true, articles };
}

export function createArticleFetcher(deps: FetchArticlesDeps): ArticleFetcher {
  return (query, window) => fetchArticles(query, window, deps);
}
