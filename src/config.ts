import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { logLevels } from './logger.js';

// ============================================================================
// Postloop: Configuration
// Validates all environment variables at startup
// ============================================================================

/** Accepts true/1/yes (any case) as true, anything else as false. */
const flag = (defaultValue: boolean) =>
    z.string()
        .transform(v => ['true', '1', 'yes'].includes(v.trim().toLowerCase()))
        .default(defaultValue ? 'true' : 'false');

const hour = (defaultValue: number) =>
    z.coerce.number().int().min(0, 'must be an hour between 0 and 23').max(23, 'must be an hour between 0 and 23').default(defaultValue);

const timeZone = z.string()
    .refine((v) => {
        try {
            new Intl.DateTimeFormat('en-US', { timeZone: v });
            return true;
        } catch {
            return false;
        }
    }, 'TIMEZONE must be a valid IANA timezone name')
    .optional();

export const envSchema = z.object({
    // LLM
    ANTHROPIC_API_KEY: z.string({ required_error: 'ANTHROPIC_API_KEY is required' }).min(1, 'ANTHROPIC_API_KEY is required'),
    ANTHROPIC_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),

    // Headlines
    NEWSAPI_KEY: z.string().optional(),
    NEWS_CACHE_SECONDS: z.coerce.number().int().min(0).default(60 * 60),
    CREATIVE_MODE: flag(true),

    // X / Twitter
    X_API_KEY: z.string().optional(),
    X_API_SECRET: z.string().optional(),
    X_ACCESS_TOKEN: z.string().optional(),
    X_ACCESS_SECRET: z.string().optional(),
    SIMULATION_MODE: flag(true),
    X_RATE_LIMIT_RETRY_SECONDS: z.coerce.number().int().min(0).default(60),

    // Cadence and limits
    POST_INTERVAL_SECONDS: z.coerce.number().int().min(1, 'POST_INTERVAL_SECONDS must be at least 1').default(30 * 60),
    MAX_POSTS_PER_MONTH: z.coerce.number().int().min(0).default(500),
    QUIET_HOURS_START: hour(2),
    QUIET_HOURS_END: hour(7),
    TIMEZONE: timeZone,

    // Content
    PERSONALITY_MODE: z.enum(['chill', 'hyped', 'shitpost']).default('chill'),
    USE_HASHTAGS: flag(true),
    IMAGE_FOLDER: z.string().default('./images'),
    MAX_IMAGE_SIZE: z.coerce.number().int().positive().default(5 * 1024 * 1024),

    // Duplicate suppression
    DUPLICATE_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
    MEMORY_WINDOW_SIZE: z.coerce.number().int().positive().default(144),
    MEMORY_DURATION_DAYS: z.coerce.number().positive().default(30),

    // State files
    DATA_DIR: z.string().default('./data'),
    MEMORY_FILE: z.string().optional(),
    COUNTER_FILE: z.string().optional(),
    ANALYTICS_FILE: z.string().optional(),
    SIMULATION_LOG_FILE: z.string().optional(),

    LOG_LEVEL: z.enum(logLevels).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type PersonalityMode = Env['PERSONALITY_MODE'];

export interface XCredentials {
    appKey: string;
    appSecret: string;
    accessToken: string;
    accessSecret: string;
}

export interface Config extends Env {
    /** Present only when all four X variables are set. */
    xCredentials: XCredentials | null;
    timeZone: string | undefined;
    paths: {
        memory: string;
        counter: string;
        analytics: string;
        simulationLog: string;
    };
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value;
    }
    return out;
}

/**
 * Parse and cross-check the environment. Throws ConfigurationError listing every problem.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
    const result = envSchema.safeParse(blankToUndefined(env));

    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }

    const data = result.data;
    const xCredentials = data.X_API_KEY && data.X_API_SECRET && data.X_ACCESS_TOKEN && data.X_ACCESS_SECRET
        ? {
            appKey: data.X_API_KEY,
            appSecret: data.X_API_SECRET,
            accessToken: data.X_ACCESS_TOKEN,
            accessSecret: data.X_ACCESS_SECRET,
        }
        : null;

    if (!data.SIMULATION_MODE && !xCredentials) {
        throw new ConfigurationError([
            'SIMULATION_MODE=false requires X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN and X_ACCESS_SECRET',
        ]);
    }

    const inDataDir = (file: string | undefined, fallback: string) => file ?? path.join(data.DATA_DIR, fallback);

    return {
        ...data,
        xCredentials,
        timeZone: data.TIMEZONE || undefined,
        paths: {
            memory: inDataDir(data.MEMORY_FILE, 'memory.json'),
            counter: inDataDir(data.COUNTER_FILE, 'monthly_count.json'),
            analytics: inDataDir(data.ANALYTICS_FILE, 'analytics.json'),
            simulationLog: inDataDir(data.SIMULATION_LOG_FILE, 'simulation.log.jsonl'),
        },
    };
}

/**
 * Load configuration from process.env, printing every issue before rethrowing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    try {
        return parseConfig(env);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('Invalid environment configuration:');
            for (const issue of error.issues) {
                console.error(`  -> ${issue}`);
            }
        }
        throw error;
    }
}
