import pino, { LevelWithSilent } from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === "test",
});

const env = process.env.NODE_ENV;
const LEVELS: readonly string[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLevel(value: string | undefined): value is LevelWithSilent {
    return value !== undefined && LEVELS.includes(value);
}

function resolveLevel(): LevelWithSilent {
    if (env === "test") return "silent";
    const requested = process.env.LOG_LEVEL;
    if (isLevel(requested)) return requested;
    return env === "development" ? "debug" : "info";
}

// Progress lines of a long batch run; pretty in development, JSON otherwise
export const logger = pino({
    level: resolveLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid, job: "news-relevance-fetcher" },
    transport: env === "development"
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname,job",
            },
        }
        : undefined,
});
