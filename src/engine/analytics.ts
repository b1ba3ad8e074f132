import { RECENT_POSTS_LIMIT, type AnalyticsRecord, type PostRecord } from '../state/records.js';

// ============================================================================
// Postloop: Analytics
// Additive counters. Advisory only, never consulted by the gates.
// ============================================================================

export function recordPostAnalytics(
    analytics: AnalyticsRecord,
    post: PostRecord,
    externalId: string | null,
): AnalyticsRecord {
    return {
        total_posts: analytics.total_posts + 1,
        posts_by_category: {
            ...analytics.posts_by_category,
            [post.category]: (analytics.posts_by_category[post.category] ?? 0) + 1,
        },
        last_post_time: post.timestamp,
        recent_posts: [
            ...analytics.recent_posts,
            { id: externalId, text: post.text, category: post.category, timestamp: post.timestamp },
        ].slice(-RECENT_POSTS_LIMIT),
    };
}
