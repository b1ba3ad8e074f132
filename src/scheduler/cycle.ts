import { setTimeout as delay } from 'node:timers/promises';
import { createLogger } from '../logger.js';
import { describeError } from '../errors.js';
import { recordPostAnalytics } from '../engine/analytics.js';
import { pickCategory, type Candidate, type ContentSource } from '../engine/content.js';
import { DuplicateFilter, type MemoryOptions } from '../engine/memory.js';
import { budgetSummary, checkBudget, recordPublish } from '../engine/monthly-budget.js';
import { describeWindow, isQuiet, localClock, type QuietWindow } from '../engine/quiet-hours.js';
import type { Publisher } from '../platforms/publisher.js';
import type { AnalyticsRecord, MonthlyCounter, PostRecord } from '../state/records.js';
import type { StateSnapshot, StateStore } from '../state/store.js';

// ============================================================================
// Postloop: Cycle Controller
// gating -> generating -> filtering -> publishing -> persisting -> sleeping
// One cycle at a time; any per-cycle failure becomes a skip.
// ============================================================================

const log = createLogger('Cycle');

export type CycleState = 'idle' | 'gating' | 'generating' | 'filtering' | 'publishing' | 'persisting' | 'sleeping';

export type SkipReason =
    | 'quiet_hours'
    | 'rate_limited'
    | 'no_content'
    | 'generation_failed'
    | 'duplicate'
    | 'publish_failed'
    | 'unexpected_error';

export type CycleOutcome =
    | {
        status: 'posted';
        post: PostRecord;
        id: string | null;
        simulated: boolean;
        /** False when the state files could not be written this cycle */
        persisted: boolean;
    }
    | { status: 'skipped'; reason: SkipReason; detail: string };

type Phase =
    | { state: 'gating' }
    | { state: 'generating' }
    | { state: 'filtering'; candidate: Candidate }
    | { state: 'publishing'; candidate: Candidate }
    | { state: 'persisting'; candidate: Candidate; id: string | null; simulated: boolean }
    | { state: 'done'; outcome: CycleOutcome };

export interface CycleSettings {
    intervalMs: number;
    monthlyCeiling: number;
    quietWindow: QuietWindow;
    /** IANA zone for quiet hours and month keys; process zone when undefined */
    timeZone: string | undefined;
    memory: MemoryOptions;
}

export interface CycleControllerDeps {
    store: StateStore;
    content: ContentSource;
    publisher: Publisher;
    settings: CycleSettings;
    now?: () => Date;
    random?: () => number;
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const SKIP_LOG_LEVEL: Record<SkipReason, 'info' | 'warn' | 'error'> = {
    quiet_hours: 'info',
    rate_limited: 'info',
    no_content: 'info',
    duplicate: 'info',
    generation_failed: 'warn',
    publish_failed: 'error',
    unexpected_error: 'error',
};

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        if (!signal.aborted) throw error;
    }
}

type Done = Extract<Phase, { state: 'done' }>;

function skip(reason: SkipReason, detail: string): Done {
    return { state: 'done', outcome: { status: 'skipped', reason, detail } };
}

export class CycleController {
    private state: CycleState = 'idle';
    private cycleCount = 0;
    private counter: MonthlyCounter;
    private analytics: AnalyticsRecord;
    private readonly filter: DuplicateFilter;
    private readonly now: () => Date;
    private readonly random: () => number;
    private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

    private constructor(private readonly deps: CycleControllerDeps, snapshot: StateSnapshot) {
        this.now = deps.now ?? (() => new Date());
        this.random = deps.random ?? Math.random;
        this.sleep = deps.sleep ?? abortableSleep;
        this.counter = snapshot.counter;
        this.analytics = snapshot.analytics;
        this.filter = new DuplicateFilter(snapshot.memory, deps.settings.memory, this.now());
    }

    /**
     * Load persisted state and build a controller around it.
     */
    static async create(deps: CycleControllerDeps): Promise<CycleController> {
        const now = deps.now?.() ?? new Date();
        const { monthKey } = localClock(now, deps.settings.timeZone);
        const { snapshot, report } = await deps.store.load(monthKey);

        log.info('State loaded', {
            memory: `${snapshot.memory.length} post(s) (${report.memory})`,
            counter: `${budgetSummary(snapshot.counter, deps.settings.monthlyCeiling)} (${report.counter})`,
            analytics: `${snapshot.analytics.total_posts} total (${report.analytics})`,
        });

        const degraded = Object.entries(report).filter(([, status]) => status === 'corrupt' || status === 'partial');
        if (degraded.length > 0) {
            log.warn('Some state was reinitialized or trimmed while loading', Object.fromEntries(degraded));
        }

        return new CycleController(deps, snapshot);
    }

    get currentState(): CycleState {
        return this.state;
    }

    get cycles(): number {
        return this.cycleCount;
    }

    /** In-memory view of the three records. */
    get snapshot(): StateSnapshot {
        return { memory: this.filter.records, counter: this.counter, analytics: this.analytics };
    }

    /**
     * Run gating through persisting once. Never rejects.
     */
    async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
        this.cycleCount++;
        log.info(`--- cycle ${this.cycleCount} ---`);

        let outcome: CycleOutcome;
        try {
            let phase: Phase = { state: 'gating' };
            while (phase.state !== 'done') {
                this.state = phase.state;
                phase = await this.step(phase, signal);
            }
            outcome = phase.outcome;
        } catch (error) {
            outcome = skip('unexpected_error', describeError(error)).outcome;
        } finally {
            this.state = 'idle';
        }

        this.report(outcome);
        return outcome;
    }

    /**
     * Cycle, sleep, repeat until `signal` aborts.
     */
    async run(signal: AbortSignal): Promise<void> {
        const { intervalMs } = this.deps.settings;

        while (!signal.aborted) {
            await this.runCycle(signal);
            if (signal.aborted) break;

            this.state = 'sleeping';
            log.info(`Sleeping for ${Math.round(intervalMs / 1000)}s...`);
            await this.sleep(intervalMs, signal);
            this.state = 'idle';
        }

        this.state = 'idle';
        log.info(`Stopped after ${this.cycleCount} cycle(s)`);
    }

    private async step(phase: Exclude<Phase, { state: 'done' }>, signal?: AbortSignal): Promise<Phase> {
        switch (phase.state) {
            case 'gating':
                return this.gate();

            case 'generating': {
                const category = pickCategory(this.random);
                try {
                    const result = await this.deps.content.produce(category, signal);
                    if (result.kind === 'no_content') return skip('no_content', result.reason);
                    return { state: 'filtering', candidate: result.candidate };
                } catch (error) {
                    return skip('generation_failed', describeError(error));
                }
            }

            case 'filtering': {
                const verdict = this.filter.check(phase.candidate.text, this.now());
                if (!verdict.accepted) {
                    return skip(
                        'duplicate',
                        `similarity ${verdict.similarity.toFixed(2)} with "${verdict.match.text.slice(0, 60)}"`,
                    );
                }
                return { state: 'publishing', candidate: phase.candidate };
            }

            case 'publishing': {
                const { text, category, image } = phase.candidate;
                const outcome = await this.deps.publisher
                    .publish({ text, category, image }, signal)
                    .catch((error: unknown) => ({ ok: false as const, error: describeError(error) }));
                if (!outcome.ok) return skip('publish_failed', outcome.error);
                return { state: 'persisting', candidate: phase.candidate, id: outcome.id, simulated: outcome.simulated };
            }

            case 'persisting':
                return this.persist(phase.candidate, phase.id, phase.simulated);
        }
    }

    /** Quiet hours are checked before the monthly budget. */
    private gate(): Phase {
        const { quietWindow, monthlyCeiling, timeZone } = this.deps.settings;
        const clock = localClock(this.now(), timeZone);

        if (isQuiet(clock.hour, quietWindow)) {
            return skip('quiet_hours', `hour ${clock.hour} is inside quiet window ${describeWindow(quietWindow)}`);
        }

        const budget = checkBudget(this.counter, clock.monthKey, monthlyCeiling);
        this.counter = budget.counter;
        if (!budget.allowed) {
            return skip('rate_limited', `monthly limit reached (${budgetSummary(budget.counter, budget.ceiling)})`);
        }

        return { state: 'generating' };
    }

    private async persist(candidate: Candidate, id: string | null, simulated: boolean): Promise<Phase> {
        const now = this.now();
        const post: PostRecord = { text: candidate.text, timestamp: now.toISOString(), category: candidate.category };

        // The post exists on the platform now, so memory moves forward even if the write fails
        const memory = this.filter.record(post, now);
        this.counter = recordPublish(this.counter, localClock(now, this.deps.settings.timeZone).monthKey);
        this.analytics = recordPostAnalytics(this.analytics, post, id);

        let persisted = true;
        try {
            await this.deps.store.saveAll({ memory, counter: this.counter, analytics: this.analytics });
        } catch (error) {
            persisted = false;
            log.error('Failed to persist state after publishing', { error: describeError(error) });
        }

        return { state: 'done', outcome: { status: 'posted', post, id, simulated, persisted } };
    }

    private report(outcome: CycleOutcome): void {
        if (outcome.status === 'posted') {
            log.info(`Posted ${outcome.post.category} ${outcome.simulated ? '(simulated)' : `(id ${outcome.id ?? 'unknown'})`}`, {
                text: outcome.post.text,
                budget: budgetSummary(this.counter, this.deps.settings.monthlyCeiling),
                persisted: outcome.persisted,
            });
            return;
        }

        log[SKIP_LOG_LEVEL[outcome.reason]](`Skipped cycle: ${outcome.reason}`, { detail: outcome.detail });
    }
}
