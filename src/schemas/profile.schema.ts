import { z } from "zod";

export const SearchProfileSchema = z.object({
  name: z.string().min(1),
  companyQuery: z.string().min(1),
  sectorQuery: z.string().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
});

export type SearchProfileInput = z.infer<typeof SearchProfileSchema>;
