import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { setLogLevel } from '../logger.js';
import { StorageError } from '../errors.js';
import { StateStore, readJsonRecord, writeJsonAtomic, type StatePaths, type StateSnapshot } from './store.js';
import { monthlyCounterSchema } from './records.js';

// ============================================================================
// Persistent Store: Unit Tests
// ============================================================================

let dir: string;
let paths: StatePaths;

beforeEach(async () => {
    setLogLevel('error');
    dir = await mkdtemp(path.join(tmpdir(), 'postloop-store-'));
    paths = {
        memory: path.join(dir, 'memory.json'),
        counter: path.join(dir, 'monthly_count.json'),
        analytics: path.join(dir, 'analytics.json'),
    };
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

const snapshot: StateSnapshot = {
    memory: [
        { text: 'new anime season announced today', timestamp: '2025-01-10T09:00:00.000Z', category: 'anime' },
        { text: 'totally different gaming news', timestamp: '2025-01-10T09:30:00.000Z', category: 'gaming' },
    ],
    counter: { month_key: '2025-01', count: 2 },
    analytics: {
        total_posts: 2,
        posts_by_category: { anime: 1, gaming: 1 },
        last_post_time: '2025-01-10T09:30:00.000Z',
        recent_posts: [
            { id: null, text: 'new anime season announced today', category: 'anime', timestamp: '2025-01-10T09:00:00.000Z' },
            { id: '1879', text: 'totally different gaming news', category: 'gaming', timestamp: '2025-01-10T09:30:00.000Z' },
        ],
    },
};

describe('StateStore', () => {
    it('starts from defaults when no files exist', async () => {
        const { snapshot: loaded, report } = await new StateStore(paths).load('2025-03');

        expect(report).toEqual({ memory: 'missing', counter: 'missing', analytics: 'missing' });
        expect(loaded.memory).toEqual([]);
        expect(loaded.counter).toEqual({ month_key: '2025-03', count: 0 });
        expect(loaded.analytics).toEqual({ total_posts: 0, posts_by_category: {}, last_post_time: null, recent_posts: [] });
    });

    it('round-trips all three records', async () => {
        const store = new StateStore(paths);
        await store.saveAll(snapshot);

        const { snapshot: loaded, report } = await store.load('2025-01');
        expect(report).toEqual({ memory: 'loaded', counter: 'loaded', analytics: 'loaded' });
        expect(loaded).toEqual(snapshot);
    });

    it('reinitializes only the corrupt record', async () => {
        const store = new StateStore(paths);
        await store.saveAll(snapshot);
        await writeFile(paths.counter, '{"month_key": "2025-01", "count": ', 'utf8');

        const { snapshot: loaded, report } = await store.load('2025-02');
        expect(report).toEqual({ memory: 'loaded', counter: 'corrupt', analytics: 'loaded' });
        expect(loaded.counter).toEqual({ month_key: '2025-02', count: 0 });
        expect(loaded.memory).toEqual(snapshot.memory);
        expect(loaded.analytics).toEqual(snapshot.analytics);
    });

    it('treats a schema violation as corruption', async () => {
        await writeFile(paths.analytics, JSON.stringify({ total_posts: -3 }), 'utf8');
        const { snapshot: loaded, report } = await new StateStore(paths).load('2025-01');
        expect(report.analytics).toBe('corrupt');
        expect(loaded.analytics.total_posts).toBe(0);
    });

    it('drops malformed memory entries, keeps the rest and warns', async () => {
        setLogLevel('warn');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        await writeFile(paths.memory, JSON.stringify([
            { text: 'kept entry here', timestamp: '2025-01-01T00:00:00.000Z', category: 'tech' },
            { text: 'bad timestamp', timestamp: 'yesterday-ish', category: 'tech' },
            { text: 'unknown category', timestamp: '2025-01-01T00:00:00.000Z', category: 'cooking' },
            'not even an object',
        ]), 'utf8');

        const { snapshot: loaded, report } = await new StateStore(paths).load('2025-01');
        expect(report.memory).toBe('partial');
        expect(loaded.memory).toEqual([
            { text: 'kept entry here', timestamp: '2025-01-01T00:00:00.000Z', category: 'tech' },
        ]);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(
            expect.stringMatching(/\[WARN\] \[Store\] Dropped 3 malformed memory entries$/),
            JSON.stringify({ path: paths.memory, kept: 1 }, null, 2),
        );
    });

    it('reports a clean memory file as loaded', async () => {
        await writeFile(paths.memory, JSON.stringify([
            { text: 'only good entries', timestamp: '2025-01-01T00:00:00.000Z', category: 'anime' },
        ]), 'utf8');
        const { report } = await new StateStore(paths).load('2025-01');
        expect(report.memory).toBe('loaded');
    });

    it('accepts analytics written before recent_posts existed', async () => {
        await writeFile(paths.analytics, JSON.stringify({
            total_posts: 4,
            posts_by_category: { tech: 4 },
            last_post_time: null,
        }), 'utf8');

        const { snapshot: loaded } = await new StateStore(paths).load('2025-01');
        expect(loaded.analytics).toEqual({ total_posts: 4, posts_by_category: { tech: 4 }, last_post_time: null, recent_posts: [] });
    });
});

describe('writeJsonAtomic', () => {
    it('creates missing directories and leaves no temp file behind', async () => {
        const target = path.join(dir, 'nested', 'deeper', 'counter.json');
        await writeJsonAtomic(target, { month_key: '2025-05', count: 7 });

        expect(JSON.parse(await readFile(target, 'utf8'))).toEqual({ month_key: '2025-05', count: 7 });
        expect(await readdir(path.dirname(target))).toEqual(['counter.json']);
    });

    it('fully replaces a longer previous version', async () => {
        const target = path.join(dir, 'memory.json');
        await writeJsonAtomic(target, [{ text: 'a much longer earlier entry that takes up room' }]);
        await writeJsonAtomic(target, []);

        expect(await readFile(target, 'utf8')).toBe('[]\n');
        expect(await readdir(dir)).toEqual(['memory.json']);
    });

    it('raises StorageError when the target cannot be written', async () => {
        // A directory where the file should go makes rename fail
        const target = path.join(dir, 'occupied');
        await writeJsonAtomic(path.join(target, 'inner.json'), {});

        await expect(writeJsonAtomic(target, { count: 1 })).rejects.toBeInstanceOf(StorageError);
        expect((await readdir(dir)).filter(name => name.endsWith('.tmp'))).toEqual([]);
    });
});

describe('readJsonRecord', () => {
    it('reports missing without creating the file', async () => {
        const result = await readJsonRecord(paths.counter, monthlyCounterSchema, () => ({ month_key: '2025-01', count: 0 }));
        expect(result.status).toBe('missing');
        expect(await readdir(dir)).toEqual([]);
    });

    it('rejects a month key in the wrong shape', async () => {
        await writeFile(paths.counter, JSON.stringify({ month_key: '2025-1', count: 3 }), 'utf8');
        const result = await readJsonRecord(paths.counter, monthlyCounterSchema, () => ({ month_key: '2025-01', count: 0 }));
        expect(result).toEqual({ value: { month_key: '2025-01', count: 0 }, status: 'corrupt' });
    });
});
