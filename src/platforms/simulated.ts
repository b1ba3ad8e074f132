import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../logger.js';
import { describeError } from '../errors.js';
import type { OutgoingPost, PublishOutcome, Publisher } from './publisher.js';

// ============================================================================
// Postloop: Simulation Publisher
// Appends intended posts to a JSONL log instead of contacting a platform
// ============================================================================

const log = createLogger('Simulation');

export interface SimulatedEntry {
    timestamp: string;
    text: string;
    category: string;
    image: string | null;
}

export class SimulatedPublisher implements Publisher {
    readonly mode = 'simulation' as const;

    constructor(private readonly logFile: string, private readonly now: () => Date = () => new Date()) {}

    async publish(post: OutgoingPost): Promise<PublishOutcome> {
        const entry: SimulatedEntry = {
            timestamp: this.now().toISOString(),
            text: post.text,
            category: post.category,
            image: post.image?.path ?? null,
        };

        try {
            await mkdir(path.dirname(this.logFile), { recursive: true });
            await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf8');
        } catch (error) {
            log.error('Failed to write simulation log', { file: this.logFile, error: describeError(error) });
            return { ok: false, error: `simulation log write failed: ${describeError(error)}` };
        }

        log.info(`[SIMULATION] ${post.text}`, post.image ? { image: post.image.path } : undefined);
        return { ok: true, id: null, simulated: true };
    }
}
