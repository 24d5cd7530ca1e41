export const GDELT_BASE_URL = "https://api.gdeltproject.org/api/v2/doc/doc";

export const GDELT_MODE = "ArtList";
export const GDELT_FORMAT = "json";
export const GDELT_SORT = "DateDesc";
export const GDELT_MAX_RECORDS = 250;

// Per-day truncation after ranking
export const COMPANY_LIMIT = 15;
export const SECTOR_LIMIT = 30;
