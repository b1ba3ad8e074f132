import { createLogger } from '../logger.js';
import type { PersonalityMode } from '../config.js';
import { TransientCollaboratorError, describeError } from '../errors.js';
import type { HeadlineProvider } from '../data/news.js';
import { categories, type Category } from '../state/records.js';
import {
    MAX_POST_LENGTH,
    buildHeadlinePrompt,
    buildSystemPrompt,
    hashtags,
    promptTemplates,
} from '../personality/prompts.js';
import { pickRandomImage, type PickedImage } from './images.js';
import type { TextGenerator } from './llm.js';

// ============================================================================
// Postloop: Content Generation
// Turns a category into one candidate post (text + optional image)
// ============================================================================

const log = createLogger('Content');

/** Anything shorter is treated as the model giving up ("ok", "sure", ...) */
export const MIN_CONTENT_LENGTH = 10;

/** Hashtags are only appended while the post stays under this length */
const HASHTAG_LENGTH_LIMIT = 275;

const HASHTAG_PROBABILITY = 0.4;

const QUOTE_PAIRS = [['"', '"'], ["'", "'"], ['“', '”']] as const;

export interface Candidate {
    text: string;
    category: Category;
    image: PickedImage | null;
    origin: 'headline' | 'template';
}

export type ContentResult =
    | { kind: 'candidate'; candidate: Candidate }
    | { kind: 'no_content'; reason: string };

export interface ContentSource {
    /**
     * Produce a candidate for `category`. Resolves `no_content` when there is nothing
     * to write about; rejects with TransientCollaboratorError when a backend fails.
     */
    produce(category: Category, signal?: AbortSignal): Promise<ContentResult>;
}

type Random = () => number;

function pick<T>(items: readonly T[], random: Random): T | undefined {
    return items[Math.floor(random() * items.length)];
}

export function pickCategory(random: Random = Math.random): Category {
    return pick(categories, random) ?? 'anime';
}

export function pickPrompt(category: Category, random: Random = Math.random): string {
    const templates = promptTemplates[category];
    return pick(templates, random) ?? templates[0] ?? `share a thought about ${category}`;
}

/**
 * Clean raw model output into postable text.
 */
export function sanitizeContent(raw: string): string {
    let text = raw.trim();

    // Models like to announce what they are about to do
    const preambles = [
        /^Sure[!,.]?\s*Here(?:'s| is)\s+(?:a |the |my |your )?(?:post|tweet)[:\s]*/i,
        /^Here(?:'s| is) (?:a |the |my |your )?(?:post|tweet)[:\s]*/i,
        /^(?:Post|Tweet):\s*/i,
    ];
    for (const pattern of preambles) {
        text = text.replace(pattern, '');
    }

    text = text.trim();
    for (const [open, close] of QUOTE_PAIRS) {
        if (text.length >= 2 && text.startsWith(open) && text.endsWith(close)) {
            text = text.slice(1, -1).trim();
            break;
        }
    }

    text = text.replace(/[ \t]+/g, ' ').replace(/\n{3,}/g, '\n\n').trim();

    if (text.length > MAX_POST_LENGTH) {
        const cut = text.slice(0, MAX_POST_LENGTH - 1);
        const lastSpace = cut.lastIndexOf(' ');
        text = (lastSpace > MAX_POST_LENGTH / 2 ? cut.slice(0, lastSpace) : cut).trimEnd() + '…';
    }

    return text;
}

/**
 * Sometimes append one category hashtag, when enabled and it still fits.
 */
export function maybeAddHashtag(
    text: string,
    category: Category,
    enabled: boolean,
    random: Random = Math.random,
): string {
    if (!enabled) return text;
    if (random() >= HASHTAG_PROBABILITY) return text;

    const tag = pick(hashtags[category], random);
    if (!tag || text.length + tag.length + 1 >= HASHTAG_LENGTH_LIMIT) return text;
    return `${text} ${tag}`;
}

export interface LlmContentSourceOptions {
    generator: TextGenerator;
    /** Null when no news key is configured */
    headlines: HeadlineProvider | null;
    personality: PersonalityMode;
    /** Write from templates when no headline is available */
    creativeMode: boolean;
    useHashtags: boolean;
    imageFolder: string;
    maxImageSize: number;
    random?: Random;
}

export class LlmContentSource implements ContentSource {
    private readonly random: Random;

    constructor(private readonly options: LlmContentSourceOptions) {
        this.random = options.random ?? Math.random;
    }

    async produce(category: Category, signal?: AbortSignal): Promise<ContentResult> {
        const { generator, headlines, personality, creativeMode } = this.options;

        const headline = headlines ? await headlines.pickHeadline(category, signal) : null;
        if (!headline && !creativeMode) {
            return { kind: 'no_content', reason: 'no headline available and creative mode disabled' };
        }

        const prompt = headline ? buildHeadlinePrompt(headline) : pickPrompt(category, this.random);
        const image = await pickRandomImage(this.options.imageFolder, this.options.maxImageSize, this.random);

        log.info(`Generating ${category} post`, {
            origin: headline ? 'headline' : 'template',
            prompt: prompt.slice(0, 120),
            image: image?.path,
        });

        let raw: string;
        try {
            const result = await generator.generate({
                system: buildSystemPrompt(category, personality),
                prompt,
                image: image ? { base64: image.data.toString('base64'), mediaType: image.mediaType } : undefined,
                maxTokens: 150,
                temperature: personality === 'shitpost' ? 0.8 : 0.7,
                signal,
            });
            raw = result.content;
        } catch (error) {
            throw new TransientCollaboratorError('llm', `Content generation failed: ${describeError(error)}`, { cause: error });
        }

        const text = sanitizeContent(raw);
        if (text.length < MIN_CONTENT_LENGTH) {
            return { kind: 'no_content', reason: `model returned no usable text (${text.length} chars)` };
        }

        return {
            kind: 'candidate',
            candidate: {
                text: maybeAddHashtag(text, category, this.options.useHashtags, this.random),
                category,
                image,
                origin: headline ? 'headline' : 'template',
            },
        };
    }
}
