// ============================================================================
// Postloop: Quiet Hours & Local Clock
// ============================================================================

export interface QuietWindow {
    /** First quiet hour (0-23) */
    start: number;
    /** First hour posting resumes (0-23) */
    end: number;
}

/**
 * Whether `hour` falls inside the quiet window. Windows may wrap past midnight;
 * a zero-width window (start == end) is disabled.
 */
export function isQuiet(hour: number, window: QuietWindow): boolean {
    const { start, end } = window;
    if (start === end) return false;
    if (start < end) return hour >= start && hour < end;
    return hour >= start || hour < end;
}

export function describeWindow(window: QuietWindow): string {
    if (window.start === window.end) return 'disabled';
    const pad = (h: number) => `${String(h).padStart(2, '0')}:00`;
    return `${pad(window.start)}-${pad(window.end)}`;
}

export interface LocalClock {
    /** 0-23 */
    hour: number;
    /** YYYY-MM */
    monthKey: string;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string | undefined): Intl.DateTimeFormat {
    const key = timeZone ?? '';
    let formatter = formatters.get(key);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            hour: '2-digit',
            hourCycle: 'h23',
        });
        formatters.set(key, formatter);
    }
    return formatter;
}

/**
 * Wall-clock hour and month in `timeZone` (the process's zone when undefined).
 */
export function localClock(now: Date, timeZone?: string): LocalClock {
    const parts = formatterFor(timeZone).formatToParts(now);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';

    return {
        hour: Number.parseInt(part('hour'), 10) % 24,
        monthKey: `${part('year')}-${part('month')}`,
    };
}
