import { createLogger } from '../logger.js';
import type { MemoryRecords, PostRecord } from '../state/records.js';
import { jaccard, tokenSet } from './similarity.js';

// ============================================================================
// Postloop: Post Memory & Duplicate Filter
// Keeps a bounded, chronological window of published posts and rejects
// candidates that overlap too much with any of them.
// ============================================================================

const log = createLogger('Memory');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MemoryOptions {
    /** Rejection threshold for the Jaccard index, inclusive */
    threshold: number;
    /** Maximum records kept; oldest are evicted first */
    capacity: number;
    /** Records older than this are forgotten */
    maxAgeDays: number;
}

export type FilterVerdict =
    | { accepted: true }
    | { accepted: false; reason: 'duplicate'; similarity: number; match: PostRecord };

/**
 * Drop records past the age limit, then keep only the newest `capacity`.
 */
export function pruneMemory(records: MemoryRecords, options: MemoryOptions, now: Date): PostRecord[] {
    const cutoff = now.getTime() - options.maxAgeDays * DAY_MS;
    const fresh = records.filter(r => Date.parse(r.timestamp) >= cutoff);
    return fresh.length > options.capacity ? fresh.slice(fresh.length - options.capacity) : fresh;
}

/**
 * First remembered post (oldest first) whose similarity reaches the threshold.
 */
export function findSimilar(
    candidate: string,
    records: MemoryRecords,
    threshold: number,
): { similarity: number; match: PostRecord } | null {
    const candidateTokens = tokenSet(candidate);
    for (const record of records) {
        const similarity = jaccard(candidateTokens, tokenSet(record.text));
        if (similarity >= threshold) return { similarity, match: record };
    }
    return null;
}

export class DuplicateFilter {
    private memory: PostRecord[];

    constructor(records: MemoryRecords, private readonly options: MemoryOptions, now: Date = new Date()) {
        this.memory = pruneMemory(records, options, now);
        if (this.memory.length !== records.length) {
            log.info(`Forgot ${records.length - this.memory.length} post(s) outside the memory window`);
        }
    }

    /** Snapshot of the window, oldest first. */
    get records(): MemoryRecords {
        return [...this.memory];
    }

    get size(): number {
        return this.memory.length;
    }

    /**
     * Forget expired posts, then compare `candidate` against what remains.
     */
    check(candidate: string, now: Date = new Date()): FilterVerdict {
        this.memory = pruneMemory(this.memory, this.options, now);
        const hit = findSimilar(candidate, this.memory, this.options.threshold);
        if (!hit) return { accepted: true };

        log.debug('Candidate matches remembered post', {
            similarity: Number(hit.similarity.toFixed(3)),
            match: hit.match.text.slice(0, 80),
        });
        return { accepted: false, reason: 'duplicate', ...hit };
    }

    /**
     * Append a published post, evicting by age and capacity. Returns the new window.
     */
    record(post: PostRecord, now: Date = new Date()): MemoryRecords {
        this.memory = pruneMemory([...this.memory, post], this.options, now);
        return this.records;
    }
}
