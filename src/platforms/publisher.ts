import type { PickedImage } from '../engine/images.js';
import type { Category } from '../state/records.js';

// ============================================================================
// Postloop: Publisher Contract
// ============================================================================

export interface OutgoingPost {
    text: string;
    category: Category;
    image: PickedImage | null;
}

export type PublishOutcome =
    | { ok: true; id: string | null; simulated: boolean }
    | { ok: false; error: string };

export interface Publisher {
    readonly mode: 'live' | 'simulation';
    /** Never rejects: every failure comes back as `{ ok: false }`. */
    publish(post: OutgoingPost, signal?: AbortSignal): Promise<PublishOutcome>;
}
