import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import { createLogger } from '../logger.js';
import { StorageError, describeError } from '../errors.js';
import {
    analyticsSchema,
    emptyAnalytics,
    emptyCounter,
    emptyMemory,
    memoryFileSchema,
    monthlyCounterSchema,
    parseMemoryEntries,
    type AnalyticsRecord,
    type MemoryRecords,
    type MonthlyCounter,
    type PostRecord,
} from './records.js';

// ============================================================================
// Postloop: Persistent Store
// Three independent JSON files. Reads never throw; writes go to a temp file
// and are renamed into place so a killed process leaves the previous version.
// ============================================================================

const log = createLogger('Store');

/** `partial`: the file parsed but some entries were invalid and dropped. */
export type LoadStatus = 'loaded' | 'partial' | 'missing' | 'corrupt';

export interface LoadResult<T> {
    value: T;
    status: LoadStatus;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate one JSON record. A missing file yields the fallback silently;
 * an unreadable, unparseable or schema-violating file yields the fallback with a warning.
 */
export async function readJsonRecord<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: () => T,
): Promise<LoadResult<T>> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) {
            log.debug('No state file yet, starting fresh', { path: filePath });
            return { value: fallback(), status: 'missing' };
        }
        log.warn('Could not read state file, reinitializing record', { path: filePath, error: describeError(error) });
        return { value: fallback(), status: 'corrupt' };
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        log.warn('State file is not valid JSON, reinitializing record', { path: filePath, error: describeError(error) });
        return { value: fallback(), status: 'corrupt' };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        log.warn('State file failed validation, reinitializing record', {
            path: filePath,
            issues: parsed.error.issues.slice(0, 5).map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
        });
        return { value: fallback(), status: 'corrupt' };
    }

    return { value: parsed.data, status: 'loaded' };
}

/**
 * Serialize to `<file>.<pid>.tmp`, flush it to disk, then rename over the target.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
        await mkdir(path.dirname(filePath), { recursive: true });
        const handle = await open(tmpPath, 'w');
        try {
            await handle.writeFile(JSON.stringify(value, null, 2) + '\n', 'utf8');
            // Data must reach the disk before the rename makes it visible
            await handle.sync();
        } finally {
            await handle.close();
        }
        await rename(tmpPath, filePath);
    } catch (error) {
        await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
            log.debug('Could not remove temp file', { path: tmpPath, error: describeError(cleanupError) });
        });
        throw new StorageError(filePath, `Failed to write state: ${describeError(error)}`, { cause: error });
    }
}

export interface StatePaths {
    memory: string;
    counter: string;
    analytics: string;
}

export interface StateSnapshot {
    memory: MemoryRecords;
    counter: MonthlyCounter;
    analytics: AnalyticsRecord;
}

export interface StateLoadReport {
    memory: LoadStatus;
    counter: LoadStatus;
    analytics: LoadStatus;
}

export class StateStore {
    constructor(private readonly paths: StatePaths) {}

    /**
     * Load all three records independently; corruption in one never affects the others.
     */
    async load(currentMonthKey: string): Promise<{ snapshot: StateSnapshot; report: StateLoadReport }> {
        const [memory, counter, analytics] = await Promise.all([
            this.loadMemory(),
            readJsonRecord(this.paths.counter, monthlyCounterSchema, () => emptyCounter(currentMonthKey)),
            readJsonRecord(this.paths.analytics, analyticsSchema, emptyAnalytics),
        ]);

        return {
            snapshot: { memory: memory.value, counter: counter.value, analytics: analytics.value },
            report: { memory: memory.status, counter: counter.status, analytics: analytics.status },
        };
    }

    private async loadMemory(): Promise<LoadResult<PostRecord[]>> {
        const file = await readJsonRecord<unknown[]>(this.paths.memory, memoryFileSchema, emptyMemory);
        const { records, dropped } = parseMemoryEntries(file.value);
        if (dropped === 0) return { value: records, status: file.status };

        log.warn(`Dropped ${dropped} malformed memory entr${dropped === 1 ? 'y' : 'ies'}`, {
            path: this.paths.memory,
            kept: records.length,
        });
        return { value: records, status: 'partial' };
    }

    saveMemory(memory: MemoryRecords): Promise<void> {
        return writeJsonAtomic(this.paths.memory, memory);
    }

    saveCounter(counter: MonthlyCounter): Promise<void> {
        return writeJsonAtomic(this.paths.counter, counter);
    }

    saveAnalytics(analytics: AnalyticsRecord): Promise<void> {
        return writeJsonAtomic(this.paths.analytics, analytics);
    }

    /** Flush every record; the first failure is rethrown after the rest were attempted. */
    async saveAll(snapshot: StateSnapshot): Promise<void> {
        const results = await Promise.allSettled([
            this.saveMemory(snapshot.memory),
            this.saveCounter(snapshot.counter),
            this.saveAnalytics(snapshot.analytics),
        ]);
        const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
        if (failure) throw failure.reason;
    }
}
