// ============================================================================
// Postloop: Error Types
// Only ConfigurationError is fatal; everything else ends a single cycle
// ============================================================================

export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

export type Collaborator = 'content' | 'llm' | 'news' | 'publisher';

/** A content source or publisher failed for this cycle. */
export class TransientCollaboratorError extends Error {
    readonly collaborator: Collaborator;

    constructor(collaborator: Collaborator, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientCollaboratorError';
        this.collaborator = collaborator;
    }
}

export class StorageError extends Error {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(`${message} (${path})`, options);
        this.name = 'StorageError';
        this.path = path;
    }
}

/** Short, log-safe description of any thrown value. */
export function describeError(error: unknown, maxLength = 200): string {
    const text = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return text.slice(0, maxLength);
}

/** HTTP status carried by SDK errors (`status`) or raw API errors (`statusCode`, `code`). */
export function errorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    for (const key of ['status', 'statusCode', 'code'] as const) {
        if (key in error) {
            const value: unknown = Reflect.get(error, key);
            if (typeof value === 'number') return value;
        }
    }
    return undefined;
}
