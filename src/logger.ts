// ============================================================================
// Postloop: Logger
// Leveled console logger, one instance per component
// ============================================================================

export const logLevels = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof logLevels[number];

const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function formatData(data: Record<string, unknown>): string {
    try {
        return JSON.stringify(data, null, 2);
    } catch {
        return String(data);
    }
}

function log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>) {
    if (levels[level] < levels[currentLevel]) return;

    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}]`;
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    if (data && Object.keys(data).length > 0) {
        logFn(`${prefix} ${message}`, formatData(data));
    } else {
        logFn(`${prefix} ${message}`);
    }
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => log('debug', component, msg, data),
        info: (msg, data) => log('info', component, msg, data),
        warn: (msg, data) => log('warn', component, msg, data),
        error: (msg, data) => log('error', component, msg, data),
    };
}
