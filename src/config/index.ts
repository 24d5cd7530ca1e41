import fs from "fs";
import path from "path";
import { z } from "zod";
import { PipelineConfig, SearchProfile } from "../interfaces/pipeline";
import { SearchProfileSchema } from "../schemas/profile.schema";
import {
    COMPANY_LIMIT,
    GDELT_BASE_URL,
    GDELT_MAX_RECORDS,
    SECTOR_LIMIT,
} from "../constants/gdelt";
import { parseDay } from "../utils/time";

const PROJECT_ROOT = path.resolve(__dirname, "..", "..");

const daySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
    START_DATE: daySchema.default("2023-04-28"),
    END_DATE: daySchema.default("2025-10-28"),
    OUTPUT_FILE: z.string().min(1).default("historical_news_hdfc_bank_filtered.csv"),
    REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(15_000),
    MIN_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    PROFILE_PATH: z.string().min(1).default("config/profiles/hdfc-bank.json"),
    GDELT_BASE_URL: z.string().url().default(GDELT_BASE_URL),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Reads and validates a search profile. Relative paths resolve
 * against the project root so the job can run from any cwd.
 */
export function loadProfile(profilePath: string): SearchProfile {
    const resolved = path.isAbsolute(profilePath)
        ? profilePath
        : path.join(PROJECT_ROOT, profilePath);

    const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
    const parsed = SearchProfileSchema.safeParse(raw);

    if (!parsed.success) {
        throw new Error(
            `Invalid search profile ${resolved}: ${parsed.error.issues
                .map(issue => `${issue.path.join(".") || "<root>"} ${issue.message}`)
                .join("; ")}`
        );
    }

    return Object.freeze({
        ...parsed.data,
        keywords: Object.freeze([...parsed.data.keywords]),
    });
}

export function buildConfig(env: Env, profile: SearchProfile): PipelineConfig {
    const startDate = parseDay(env.START_DATE);
    const endDate = parseDay(env.END_DATE);

    if (startDate.getTime() > endDate.getTime()) {
        throw new Error(`START_DATE ${env.START_DATE} is after END_DATE ${env.END_DATE}`);
    }

    return Object.freeze({
        startDate,
        endDate,
        outputFile: env.OUTPUT_FILE,
        requestDelayMs: env.REQUEST_DELAY_MS,
        minRequestIntervalMs: env.MIN_REQUEST_INTERVAL_MS,
        requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
        baseUrl: env.GDELT_BASE_URL,
        maxRecords: GDELT_MAX_RECORDS,
        limits: Object.freeze({ company: COMPANY_LIMIT, sector: SECTOR_LIMIT }),
        profile,
    });
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const env = envSchema.parse(source);
    return buildConfig(env, loadProfile(env.PROFILE_PATH));
}
