// ============================================================================
// Postloop: Text Similarity
// Word-set Jaccard index used by the duplicate filter
// ============================================================================

/**
 * Lowercased word set with URLs, @mentions, #hashtags and punctuation removed.
 * Single-character words are ignored.
 */
export function tokenSet(text: string): Set<string> {
    const cleaned = text
        .toLowerCase()
        .replace(/https?:\/\/\S+|www\.\S+/g, ' ')
        .replace(/[@#][\p{L}\p{N}_]+/gu, ' ')
        .replace(/[^\p{L}\p{N}_\s]+/gu, '');

    const out = new Set<string>();
    for (const word of cleaned.split(/\s+/)) {
        if (word.length > 1) out.add(word);
    }
    return out;
}

/**
 * |A ∩ B| / |A ∪ B|. Two empty sets are identical (1); one empty set matches nothing (0).
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 1;
    if (a.size === 0 || b.size === 0) return 0;

    let inter = 0;
    for (const x of a) if (b.has(x)) inter++;
    return inter / (a.size + b.size - inter);
}

export function textSimilarity(a: string, b: string): number {
    return jaccard(tokenSet(a), tokenSet(b));
}
