import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

const { me } = vi.hoisted(() => ({ me: vi.fn() }));

vi.mock('twitter-api-v2', () => ({
    TwitterApi: class {
        v2 = { me };
    },
}));

import { checkCapabilities } from './capabilities.js';
import { parseConfig } from './config.js';
import { SimulatedPublisher } from './platforms/simulated.js';
import { XPublisher } from './platforms/x.js';

// ============================================================================
// Capability Check: Unit Tests
// ============================================================================

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'postloop-caps-'));
    me.mockReset();
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

const xKeys = {
    X_API_KEY: 'test-app-key',
    X_API_SECRET: 'test-app-secret',
    X_ACCESS_TOKEN: 'test-access-token',
    X_ACCESS_SECRET: 'test-access-secret',
};

describe('checkCapabilities', () => {
    it('reports the LLM as configured rather than verified', async () => {
        const config = parseConfig({ ANTHROPIC_API_KEY: 'test-key', DATA_DIR: dir, IMAGE_FOLDER: dir });
        await writeFile(path.join(dir, 'pic.png'), 'png');

        const lines = await checkCapabilities(config, new SimulatedPublisher(config.paths.simulationLog));

        expect(lines[1]).toBe('  Anthropic LLM:  [CONFIGURED] claude-haiku-4-5-20251001');
        expect(lines[2]).toBe('  X Posting:      [MISSING] Missing keys');
        expect(lines[3]).toBe('  Headlines:      [MISSING] NEWSAPI_KEY not set | creative mode on');
        expect(lines[4]).toBe(`  Images:         1 in ${dir}`);
        expect(lines[5]).toMatch(new RegExp(`^  Disk:           \\[(OK|LOW)\\] \\d+ MiB free in ${dir.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}$`));
        expect(lines[6]).toBe('  Posting Mode:   [SIMULATION]');
    });

    it('warns when the data directory cannot be inspected', async () => {
        const missing = path.join(dir, 'not-created-yet');
        const config = parseConfig({ ANTHROPIC_API_KEY: 'test-key', DATA_DIR: missing, IMAGE_FOLDER: dir });

        const lines = await checkCapabilities(config, new SimulatedPublisher(config.paths.simulationLog));

        expect(lines[5]).toMatch(/^ {2}Disk: {11}\[WARN\] Cannot read free space in /);
    });

    it('authenticates against X in live mode', async () => {
        me.mockResolvedValue({ data: { id: '1', name: 'Postloop', username: 'postloop_bot' } });
        const config = parseConfig({ ANTHROPIC_API_KEY: 'test-key', SIMULATION_MODE: 'false', DATA_DIR: dir, ...xKeys });
        const publisher = new XPublisher(
            { appKey: 'test-app-key', appSecret: 'test-app-secret', accessToken: 'test-access-token', accessSecret: 'test-access-secret' },
            { rateLimitRetryMs: 0 },
        );

        const lines = await checkCapabilities(config, publisher);

        expect(lines[2]).toBe('  X Posting:      [OK] Authenticated as @postloop_bot');
        expect(lines[6]).toBe('  Posting Mode:   [LIVE]');
    });

    it('keeps going when X authentication fails', async () => {
        me.mockRejectedValue(new Error('bad token'));
        const config = parseConfig({ ANTHROPIC_API_KEY: 'test-key', SIMULATION_MODE: 'false', DATA_DIR: dir, ...xKeys });
        const publisher = new XPublisher(
            { appKey: 'test-app-key', appSecret: 'test-app-secret', accessToken: 'test-access-token', accessSecret: 'test-access-secret' },
            { rateLimitRetryMs: 0 },
        );

        const lines = await checkCapabilities(config, publisher);

        expect(lines[2]).toBe('  X Posting:      [WARN] Auth check failed: Error: bad token');
    });
});
