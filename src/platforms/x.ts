import { setTimeout as delay } from 'node:timers/promises';
import { TwitterApi } from 'twitter-api-v2';
import type { XCredentials } from '../config.js';
import { createLogger } from '../logger.js';
import { describeError, errorStatus } from '../errors.js';
import type { OutgoingPost, PublishOutcome, Publisher } from './publisher.js';

// ============================================================================
// Postloop: X (Twitter) Publisher
// Posts a single tweet, optionally with one image, via the X API v2
// ============================================================================

const log = createLogger('X');

export interface XPublisherOptions {
    /** Wait before the single retry after HTTP 429 */
    rateLimitRetryMs: number;
}

export class XPublisher implements Publisher {
    readonly mode = 'live' as const;
    private readonly client: TwitterApi;

    constructor(credentials: XCredentials, private readonly options: XPublisherOptions) {
        this.client = new TwitterApi({
            appKey: credentials.appKey,
            appSecret: credentials.appSecret,
            accessToken: credentials.accessToken,
            accessSecret: credentials.accessSecret,
        });
    }

    async publish(post: OutgoingPost, signal?: AbortSignal): Promise<PublishOutcome> {
        try {
            const id = await this.send(post);
            return { ok: true, id, simulated: false };
        } catch (error) {
            if (errorStatus(error) !== 429) {
                log.error('Failed to post tweet', { error: describeError(error) });
                return { ok: false, error: describeError(error) };
            }
        }

        log.warn(`Rate limited by X API, retrying in ${this.options.rateLimitRetryMs / 1000}s...`);
        try {
            await delay(this.options.rateLimitRetryMs, undefined, { signal });
            const id = await this.send(post);
            log.info('Tweet posted after rate limit retry', { id });
            return { ok: true, id, simulated: false };
        } catch (error) {
            log.error('Failed to post tweet after rate limit retry', { error: describeError(error) });
            return { ok: false, error: describeError(error) };
        }
    }

    private async send(post: OutgoingPost): Promise<string> {
        if (!post.image) {
            const result = await this.client.v2.tweet(post.text);
            log.info('Tweet posted', { id: result.data.id, length: post.text.length });
            return result.data.id;
        }

        const mediaId = await this.client.v1.uploadMedia(post.image.data, { mimeType: post.image.mediaType });
        log.info('Image uploaded to X', { mediaId, size: post.image.data.length });

        const result = await this.client.v2.tweet(post.text, { media: { media_ids: [mediaId] } });
        log.info('Tweet with image posted', { id: result.data.id, length: post.text.length });
        return result.data.id;
    }

    /** Confirms the credentials by reading the account profile. */
    async whoAmI(): Promise<string> {
        const me = await this.client.v2.me();
        return me.data.username;
    }
}
