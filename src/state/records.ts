import { z } from 'zod';

// ============================================================================
// Postloop: Persisted Record Schemas
// Enforced at the load boundary; nothing downstream re-validates.
// ============================================================================

export const categories = ['anime', 'gaming', 'tech'] as const;

export const categorySchema = z.enum(categories);

export type Category = z.infer<typeof categorySchema>;

const isoTimestamp = z.string().refine(v => !Number.isNaN(Date.parse(v)), 'invalid timestamp');

export const postRecordSchema = z.object({
    text: z.string(),
    timestamp: isoTimestamp,
    category: categorySchema,
});

export type PostRecord = Readonly<z.infer<typeof postRecordSchema>>;

/** Memory file: oldest first. Entries are validated one by one so a bad entry costs only itself. */
export const memoryFileSchema = z.array(z.unknown());

export interface ParsedMemory {
    records: PostRecord[];
    /** Entries that failed `postRecordSchema` */
    dropped: number;
}

export function parseMemoryEntries(items: readonly unknown[]): ParsedMemory {
    const records: PostRecord[] = [];
    for (const item of items) {
        const parsed = postRecordSchema.safeParse(item);
        if (parsed.success) records.push(parsed.data);
    }
    return { records, dropped: items.length - records.length };
}

export type MemoryRecords = readonly PostRecord[];

export const monthlyCounterSchema = z.object({
    month_key: z.string().regex(/^\d{4}-\d{2}$/, 'month_key must look like YYYY-MM'),
    count: z.number().int().min(0),
});

export type MonthlyCounter = Readonly<z.infer<typeof monthlyCounterSchema>>;

export const RECENT_POSTS_LIMIT = 200;

export const recentPostSchema = z.object({
    id: z.string().nullable(),
    text: z.string(),
    category: categorySchema,
    timestamp: isoTimestamp,
});

export type RecentPost = Readonly<z.infer<typeof recentPostSchema>>;

export const analyticsSchema = z.object({
    total_posts: z.number().int().min(0),
    posts_by_category: z.record(z.string(), z.number().int().min(0)),
    last_post_time: isoTimestamp.nullable(),
    // Older files predate this field
    recent_posts: z.array(recentPostSchema).default([]).transform(posts => posts.slice(-RECENT_POSTS_LIMIT)),
});

export type AnalyticsRecord = z.infer<typeof analyticsSchema>;

export function emptyMemory(): PostRecord[] {
    return [];
}

/** The empty counter; `month_key` is replaced on the first rate check. */
export function emptyCounter(monthKey: string): MonthlyCounter {
    return { month_key: monthKey, count: 0 };
}

export function emptyAnalytics(): AnalyticsRecord {
    return { total_posts: 0, posts_by_category: {}, last_post_time: null, recent_posts: [] };
}
