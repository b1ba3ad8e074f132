import { z } from 'zod';
import { createLogger } from '../logger.js';
import { describeError } from '../errors.js';
import { withRetry } from '../retry.js';
import { sanitizeUserInput } from '../engine/sanitize-input.js';
import { newsQueries } from '../personality/prompts.js';
import type { Category } from '../state/records.js';

// ============================================================================
// Postloop: News Headlines
// Fetches recent headlines from NewsAPI, cached per category
// ============================================================================

const log = createLogger('News');

const NEWSAPI_URL = 'https://newsapi.org/v2/everything';

const newsResponseSchema = z.object({
    status: z.string(),
    articles: z.array(z.object({
        title: z.string().nullable().optional(),
    })).default([]),
});

class NewsApiError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
        this.name = 'NewsApiError';
    }
}

interface CacheEntry {
    headlines: string[];
    fetchedAt: number;
}

export interface HeadlineProvider {
    /** A random recent headline, or null when none is available. */
    pickHeadline(category: Category, signal?: AbortSignal): Promise<string | null>;
}

export class NewsApiHeadlines implements HeadlineProvider {
    private readonly cache = new Map<Category, CacheEntry>();

    constructor(
        private readonly apiKey: string,
        private readonly cacheTtlMs: number,
        private readonly now: () => number = Date.now,
    ) {}

    async pickHeadline(category: Category, signal?: AbortSignal): Promise<string | null> {
        const headlines = await this.getHeadlines(category, signal);
        if (headlines.length === 0) return null;
        return headlines[Math.floor(Math.random() * headlines.length)] ?? null;
    }

    async getHeadlines(category: Category, signal?: AbortSignal): Promise<string[]> {
        const cached = this.cache.get(category);
        if (cached && this.now() - cached.fetchedAt < this.cacheTtlMs) {
            return cached.headlines;
        }

        try {
            const headlines = await withRetry(
                () => this.fetchHeadlines(category, signal),
                { label: `NewsAPI ${category}`, circuitBreakerKey: 'news', maxRetries: 2, signal },
            );
            this.cache.set(category, { headlines, fetchedAt: this.now() });
            log.debug(`Cached ${headlines.length} ${category} headline(s)`);
            return headlines;
        } catch (error) {
            log.warn('Failed to fetch headlines', { category, error: describeError(error) });
            // A stale list beats none
            return cached?.headlines ?? [];
        }
    }

    private async fetchHeadlines(category: Category, signal?: AbortSignal): Promise<string[]> {
        const url = new URL(NEWSAPI_URL);
        url.searchParams.set('q', newsQueries[category]);
        url.searchParams.set('language', 'en');
        url.searchParams.set('sortBy', 'publishedAt');
        url.searchParams.set('pageSize', '20');

        const timeout = AbortSignal.timeout(10_000);
        const response = await fetch(url, {
            headers: { 'X-Api-Key': this.apiKey },
            signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        });

        if (!response.ok) {
            throw new NewsApiError(`NewsAPI responded ${response.status}`, response.status);
        }

        const body = newsResponseSchema.parse(await response.json());
        return body.articles
            .map(a => (a.title ?? '').trim())
            .filter(title => title.length > 0 && title !== '[Removed]')
            .map(title => sanitizeUserInput(title, 200));
    }
}
