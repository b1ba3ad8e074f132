// ============================================================================
// Postloop: Input Sanitization
// Cleans third-party text (headlines) before it is placed in a prompt.
// ============================================================================

const INJECTION_PATTERNS = [
    /ignore\s+(all\s+)?(previous|prior)\s+instructions?/gi,
    /disregard\s+(all\s+)?previous/gi,
    /forget\s+(all\s+)?previous/gi,
    /you\s+are\s+now\s+an?\b/gi,
    /act\s+as\s+(if\s+)?you\s+are/gi,
    /pretend\s+(to\s+be|you\s+are)/gi,
    /system\s*prompt/gi,
    /reveal\s+(your\s+)?(system|instructions|prompt)/gi,
];

/**
 * Replace known prompt-injection phrases, drop control characters and quotes,
 * collapse whitespace and truncate to `maxLength`.
 */
export function sanitizeUserInput(text: string, maxLength = 500): string {
    let cleaned = text;
    for (const pattern of INJECTION_PATTERNS) {
        cleaned = cleaned.replace(pattern, '[filtered]');
    }
    cleaned = cleaned
        .replace(/[\u0000-\u001f\u007f]/g, ' ')
        .replace(/["“”]/g, "'")
        .replace(/\s+/g, ' ')
        .trim();
    return cleaned.slice(0, maxLength);
}
