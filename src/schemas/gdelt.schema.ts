import { z } from "zod";

/**
 * Single entry of a DOC API ArtList response.
 * Every field is optional: GDELT omits what it could not extract.
 */
export const GdeltArticleSchema = z.object({
  url: z.string().nullish(),
  url_mobile: z.string().nullish(),
  title: z.string().nullish(),
  seendate: z.string().nullish(),   // e.g. 20240101T101500Z, kept verbatim
  socialimage: z.string().nullish(),
  domain: z.string().nullish(),
  language: z.string().nullish(),
  sourcecountry: z.string().nullish(),
});

export const GdeltResponseSchema = z.object({
  articles: z.array(GdeltArticleSchema).optional(),
});

export type GdeltArticle = z.infer<typeof GdeltArticleSchema>;
export type GdeltResponse = z.infer<typeof GdeltResponseSchema>;
