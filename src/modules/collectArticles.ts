import { logger } from "../logger";
import { ArticleRecord, Category, FetchResult, ScoredArticle } from "../interfaces/article";
import { CollectionResult, PipelineConfig, QueryWindow } from "../interfaces/pipeline";
import { ArticleFetcher } from "./fetchArticles";
import { addDays, daysBetweenInclusive, formatDay, sleep as defaultSleep } from "../utils/time";

export type CollectArticlesDeps = {
  fetchArticles: ArticleFetcher;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Tags articles with their category, orders them by relevance (stable,
 * so equal scores keep provider order) and keeps the first `limit`.
 */
export function rankArticles(
  articles: ScoredArticle[],
  category: Category,
  limit: number
): ArticleRecord[] {
  return articles
    .map((article): ArticleRecord => ({ ...article, category }))
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, limit);
}

export function queryWindowFor(day: Date): QueryWindow {
  return { start: day, end: addDays(day, 1) };
}

/**
 * Walks every day of the configured range, one search per category,
 * strictly one after the other, pausing `requestDelayMs` after each day.
 */
export async function collectArticles(
  config: PipelineConfig,
  { fetchArticles, sleep = defaultSleep }: CollectArticlesDeps
): Promise<CollectionResult> {
  const { profile, limits } = config;
  const queries: Record<Category, string> = {
    company: profile.companyQuery,
    sector: profile.sectorQuery,
  };

  const articles: ArticleRecord[] = [];
  const totals: Record<Category, number> = { company: 0, sector: 0 };
  let failedCalls = 0;
  let days = 0;

  const totalDays = daysBetweenInclusive(config.startDate, config.endDate);
  logger.info(
    { profile: profile.name, from: formatDay(config.startDate), to: formatDay(config.endDate), totalDays },
    "Starting news collection"
  );

  for (
    let current = config.startDate;
    current.getTime() <= config.endDate.getTime();
    current = addDays(current, 1)
  ) {
    const window = queryWindowFor(current);
    const day = formatDay(current);
    const kept: Record<Category, number> = { company: 0, sector: 0 };

    for (const category of ["company", "sector"] as const) {
      const result: FetchResult = await fetchArticles(queries[category], window);
      if (!result.ok) failedCalls++;

      const ranked = rankArticles(result.ok ? result.articles : [], category, limits[category]);
      articles.push(...ranked);
      totals[category] += ranked.length;
      kept[category] = ranked.length;
    }

    days++;
    logger.info(
      { day, company: kept.company, sector: kept.sector, progress: `${days}/${totalDays}` },
      "Fetched day"
    );

    await sleep(config.requestDelayMs);
  }

  return { articles, totals, days, failedCalls };
}
