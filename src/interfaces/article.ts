export type Category = "company" | "sector";

/**
 * Article as returned by the fetcher: mapped from the provider,
 * keyword-filtered and scored, not yet assigned to a category.
 */
export interface ScoredArticle {
  publicationDate: string | null;
  title: string;
  url: string | null;
  domain: string | null;
  language: string | null;
  sourceCountry: string | null;
  relevanceScore: number;
}

export interface ArticleRecord extends ScoredArticle {
  category: Category;
}

export type FetchResult =
  | { ok: true; articles: ScoredArticle[] }
  | { ok: false; reason: string; status?: number };
