import { statfs } from 'node:fs/promises';
import path from 'node:path';
import type { Config } from './config.js';
import { describeError } from './errors.js';
import { listImages } from './engine/images.js';
import type { Publisher } from './platforms/publisher.js';
import { XPublisher } from './platforms/x.js';

// ============================================================================
// Postloop: Startup Capability Check
// ============================================================================

/** Below this much free space in the data directory the check reports LOW */
export const MIN_FREE_BYTES = 10 * 1024 * 1024;

const MIB = 1024 * 1024;

async function freeSpace(dir: string): Promise<string> {
    try {
        const stats = await statfs(dir);
        const free = stats.bavail * stats.bsize;
        return `${free < MIN_FREE_BYTES ? '[LOW]' : '[OK]'} ${Math.floor(free / MIB)} MiB free in ${dir}`;
    } catch (error) {
        return `[WARN] Cannot read free space in ${dir}: ${describeError(error, 80)}`;
    }
}

async function xStatus(config: Config, publisher: Publisher): Promise<string> {
    if (!(publisher instanceof XPublisher)) {
        return config.xCredentials ? '[CONFIGURED] Keys present, not used in simulation' : '[MISSING] Missing keys';
    }
    return publisher.whoAmI()
        .then(username => `[OK] Authenticated as @${username}`)
        .catch((error: unknown) => `[WARN] Auth check failed: ${describeError(error, 120)}`);
}

/**
 * Lines for the startup banner. Only X auth and disk space are probed; the LLM key is
 * reported as configured and proven by the first generation.
 */
export async function checkCapabilities(config: Config, publisher: Publisher): Promise<string[]> {
    const [x, images, disk] = await Promise.all([
        xStatus(config, publisher),
        listImages(config.IMAGE_FOLDER),
        freeSpace(path.dirname(config.paths.memory)),
    ]);

    return [
        '=== Capability Check ===',
        `  Anthropic LLM:  [CONFIGURED] ${config.ANTHROPIC_MODEL}`,
        `  X Posting:      ${x}`,
        `  Headlines:      ${config.NEWSAPI_KEY ? '[CONFIGURED] NewsAPI' : '[MISSING] NEWSAPI_KEY not set'} | creative mode ${config.CREATIVE_MODE ? 'on' : 'off'}`,
        `  Images:         ${images.length} in ${config.IMAGE_FOLDER}`,
        `  Disk:           ${disk}`,
        `  Posting Mode:   ${publisher.mode === 'live' ? '[LIVE]' : '[SIMULATION]'}`,
        '========================',
    ];
}
