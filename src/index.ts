#!/usr/bin/env node
import 'dotenv/config';
import { checkCapabilities } from './capabilities.js';
import { loadConfig, type Config } from './config.js';
import { setLogLevel, createLogger } from './logger.js';
import { ConfigurationError, describeError } from './errors.js';
import { NewsApiHeadlines } from './data/news.js';
import { LlmContentSource } from './engine/content.js';
import { AnthropicGenerator } from './engine/llm.js';
import { describeWindow } from './engine/quiet-hours.js';
import type { Publisher } from './platforms/publisher.js';
import { SimulatedPublisher } from './platforms/simulated.js';
import { XPublisher } from './platforms/x.js';
import { CycleController } from './scheduler/cycle.js';
import { StateStore } from './state/store.js';
import { getCircuitBreakerStatus } from './retry.js';

// ============================================================================
// Postloop: Entry Point
// Autonomous anime/gaming/tech posting agent
// ============================================================================

const VERSION = '1.0.0';

const log = createLogger('Postloop');

function buildPublisher(config: Config): Publisher {
    if (config.SIMULATION_MODE || !config.xCredentials) {
        return new SimulatedPublisher(config.paths.simulationLog);
    }
    return new XPublisher(config.xCredentials, { rateLimitRetryMs: config.X_RATE_LIMIT_RETRY_SECONDS * 1000 });
}

async function main(): Promise<number> {
    let config: Config;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) return 1;
        throw error;
    }

    setLogLevel(config.LOG_LEVEL);

    log.info(`Postloop v${VERSION} starting up`);
    log.info(`personality: ${config.PERSONALITY_MODE} | interval: ${config.POST_INTERVAL_SECONDS}s | hashtags: ${config.USE_HASHTAGS}`);
    log.info(`quiet hours: ${describeWindow({ start: config.QUIET_HOURS_START, end: config.QUIET_HOURS_END })}${config.timeZone ? ` (${config.timeZone})` : ''} | monthly limit: ${config.MAX_POSTS_PER_MONTH}`);

    const publisher = buildPublisher(config);
    for (const line of await checkCapabilities(config, publisher)) {
        log.info(line);
    }

    const content = new LlmContentSource({
        generator: new AnthropicGenerator(config.ANTHROPIC_API_KEY, config.ANTHROPIC_MODEL),
        headlines: config.NEWSAPI_KEY ? new NewsApiHeadlines(config.NEWSAPI_KEY, config.NEWS_CACHE_SECONDS * 1000) : null,
        personality: config.PERSONALITY_MODE,
        creativeMode: config.CREATIVE_MODE,
        useHashtags: config.USE_HASHTAGS,
        imageFolder: config.IMAGE_FOLDER,
        maxImageSize: config.MAX_IMAGE_SIZE,
    });

    const controller = await CycleController.create({
        store: new StateStore(config.paths),
        content,
        publisher,
        settings: {
            intervalMs: config.POST_INTERVAL_SECONDS * 1000,
            monthlyCeiling: config.MAX_POSTS_PER_MONTH,
            quietWindow: { start: config.QUIET_HOURS_START, end: config.QUIET_HOURS_END },
            timeZone: config.timeZone,
            memory: {
                threshold: config.DUPLICATE_SIMILARITY_THRESHOLD,
                capacity: config.MEMORY_WINDOW_SIZE,
                maxAgeDays: config.MEMORY_DURATION_DAYS,
            },
        },
    });

    const abort = new AbortController();
    const shutdown = (signal: NodeJS.Signals) => {
        if (abort.signal.aborted) return;
        log.info(`Received ${signal}, shutting down...`);
        abort.abort();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    log.info('Postloop is running. Press Ctrl+C to stop.');
    await controller.run(abort.signal);

    const troubled = Object.entries(getCircuitBreakerStatus()).filter(([, b]) => b.failures > 0 || b.isOpen);
    if (troubled.length > 0) {
        log.warn('Circuit breakers at shutdown', Object.fromEntries(troubled));
    }
    return 0;
}

// === Global Error Handlers ===
process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { reason: describeError(reason) });
});

process.on('uncaughtException', (error) => {
    log.error('FATAL: Uncaught exception, process will exit', {
        error: error.message,
        stack: error.stack?.slice(0, 500),
    });
    process.exit(1);
});

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        log.error('Fatal error', { error: describeError(error, 500) });
        process.exitCode = 1;
    });
