#!/usr/bin/env node
import axios from "axios";
import https from "https";
import { logger } from "./logger";
import { loadConfig } from "./config";
import { PipelineConfig } from "./interfaces/pipeline";
import { createGdeltLimiter } from "./modules/gdeltLimiter";
import { createArticleFetcher } from "./modules/fetchArticles";
import { collectArticles } from "./modules/collectArticles";
import { materializeArticles } from "./modules/materializeArticles";

export async function run(config: PipelineConfig): Promise<void> {
    const httpsAgent = new https.Agent({
        keepAlive: true,
        maxSockets: 1,
    });
    const axiosClient = axios.create({
        timeout: config.requestTimeoutMs,
        httpsAgent,
    });

    try {
        const fetchArticles = createArticleFetcher({
            axiosClient,
            limiter: createGdeltLimiter(config.minRequestIntervalMs),
            keywords: config.profile.keywords,
            baseUrl: config.baseUrl,
            maxRecords: config.maxRecords,
            timeoutMs: config.requestTimeoutMs,
        });

        const { articles, totals, days, failedCalls } = await collectArticles(config, {
            fetchArticles,
        });

        if (failedCalls > 0) {
            logger.warn({ failedCalls, days }, "Some searches failed and were counted as empty");
        }

        const result = materializeArticles(articles, config.outputFile);
        if (!result.written) return;

        logger.info("Fetch complete!");
        logger.info(
            `Total saved: ${result.rows} | company: ${totals.company} | sector: ${totals.sector}`
        );
        logger.info(`File: ${result.outputFile}`);
    } finally {
        httpsAgent.destroy();
    }
}

async function main() {
    const config = loadConfig();
    await run(config);
}

if (require.main === module) {
    main().catch(err => {
        logger.error({ err }, "News fetch failed");
        process.exitCode = 1;
    });
}
