import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../logger.js';
import { describeError } from '../errors.js';
import type { ImageMediaType } from './llm.js';

// ============================================================================
// Postloop: Image Picker
// Random image from a local folder, attached to the prompt and the post
// ============================================================================

const log = createLogger('Images');

const MEDIA_TYPES: Record<string, ImageMediaType> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
};

export interface PickedImage {
    path: string;
    data: Buffer;
    mediaType: ImageMediaType;
}

export function mediaTypeFor(file: string): ImageMediaType | undefined {
    return MEDIA_TYPES[path.extname(file).toLowerCase()];
}

/**
 * Candidate image files in `folder`. A missing folder simply has none.
 */
export async function listImages(folder: string): Promise<string[]> {
    try {
        const entries = await readdir(folder, { withFileTypes: true });
        return entries
            .filter(e => e.isFile() && mediaTypeFor(e.name) !== undefined)
            .map(e => path.join(folder, e.name));
    } catch (error) {
        log.debug('Image folder not readable', { folder, error: describeError(error) });
        return [];
    }
}

/**
 * Pick one image no larger than `maxBytes`, or null.
 */
export async function pickRandomImage(
    folder: string,
    maxBytes: number,
    random: () => number = Math.random,
): Promise<PickedImage | null> {
    const files = await listImages(folder);
    if (files.length === 0) return null;

    const file = files[Math.floor(random() * files.length)];
    const mediaType = file ? mediaTypeFor(file) : undefined;
    if (!file || !mediaType) return null;

    try {
        const info = await stat(file);
        if (info.size > maxBytes) {
            log.debug('Image too large, posting without one', { file, size: info.size, maxBytes });
            return null;
        }
        return { path: file, data: await readFile(file), mediaType };
    } catch (error) {
        log.debug('Failed to read image', { file, error: describeError(error) });
        return null;
    }
}
