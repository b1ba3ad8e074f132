import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../logger.js';
import { withRetry } from '../retry.js';

// ============================================================================
// Postloop: LLM Client
// Thin wrapper over the Anthropic Messages API
// ============================================================================

const log = createLogger('LLM');

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/webp';

export interface ImageInput {
    base64: string;
    mediaType: ImageMediaType;
}

export interface GenerateOptions {
    system: string;
    prompt: string;
    /** Optional picture the model should look at */
    image?: ImageInput;
    maxTokens?: number;
    temperature?: number;
    signal?: AbortSignal;
}

export interface GenerateResult {
    content: string;
    inputTokens: number;
    outputTokens: number;
    model: string;
}

export interface TextGenerator {
    generate(options: GenerateOptions): Promise<GenerateResult>;
}

function isTextBlock(block: Anthropic.ContentBlock): block is Anthropic.TextBlock {
    return block.type === 'text';
}

export class AnthropicGenerator implements TextGenerator {
    private readonly client: Anthropic;

    constructor(apiKey: string, private readonly model: string) {
        // withRetry owns retries
        this.client = new Anthropic({ apiKey, timeout: 45_000, maxRetries: 0 });
    }

    async generate(options: GenerateOptions): Promise<GenerateResult> {
        const { system, prompt, image, maxTokens = 150, temperature = 0.7, signal } = options;

        const content: Anthropic.ContentBlockParam[] = [];
        if (image) {
            content.push({
                type: 'image',
                source: { type: 'base64', media_type: image.mediaType, data: image.base64 },
            });
        }
        content.push({ type: 'text', text: prompt });

        log.debug('Generating content', { promptLength: prompt.length, withImage: Boolean(image), maxTokens, temperature });

        return withRetry(async () => {
            const response = await this.client.messages.create(
                {
                    model: this.model,
                    max_tokens: maxTokens,
                    temperature,
                    system,
                    messages: [{ role: 'user', content }],
                },
                { signal },
            );

            const text = response.content.filter(isTextBlock).map(block => block.text).join('').trim();

            const result: GenerateResult = {
                content: text,
                inputTokens: response.usage.input_tokens,
                outputTokens: response.usage.output_tokens,
                model: response.model,
            };

            log.info('Generated content', {
                tokens: `${result.inputTokens}in/${result.outputTokens}out`,
                contentLength: text.length,
            });

            return result;
        }, { label: 'LLM generate', circuitBreakerKey: 'llm', signal });
    }
}
