import { IPostRecordStore } from '../domain/ports/IPostRecordStore';
import { ILinkedInPosterService } from '../domain/ports/ILinkedInPosterService';
import { PostRecord } from '../domain/entities/PostRecord';
import { selectDuePosts } from '../domain/services/DuePostSelector';
import { DEFAULT_UTC_OFFSET_MINUTES, formatDateTime } from '../domain/services/DateTimeNormalizer';
import { PublishError, describeError } from '../domain/errors/PublishingErrors';

export const DEFAULT_SCHEDULER_INTERVAL_MS = 300_000;

export type SchedulerLifecycle = 'running' | 'stopped';
export type SchedulerActivity = 'idle' | 'ticking';

export interface PublishingSchedulerOptions {
    /** Fixed period between ticks (default 5 minutes) */
    intervalMs?: number;
    /** Tick immediately on start() instead of waiting one interval */
    runOnStart?: boolean;
    /** Offset for schedule values without a zone, also used for posted_at */
    defaultOffsetMinutes?: number;
    now?: () => Date;
}

export interface PublishedPost {
    rowNumber: number;
    postNumber: number | null;
    providerPostId: string;
    postedAt: string;
}

export interface FailedPost {
    rowNumber: number;
    postNumber: number | null;
    error: string;
    status?: number;
    transient: boolean;
}

/**
 * Published remotely but not marked in the store: will be published again next tick.
 */
export interface UnmarkedPost {
    rowNumber: number;
    postNumber: number | null;
    providerPostId: string;
    error: string;
}

export interface TickReport {
    startedAt: Date;
    finishedAt: Date;
    scanned: number;
    due: number;
    published: PublishedPost[];
    failed: FailedPost[];
    unmarked: UnmarkedPost[];
    skipped: number;
    /** Set when the store could not be read and nothing was processed */
    aborted?: string;
}

export interface SchedulerStatus {
    lifecycle: SchedulerLifecycle;
    activity: SchedulerActivity;
    intervalMs: number;
    tickCount: number;
    nextTickAt: Date | null;
    lastTick: TickReport | null;
}

/**
 * Polls the post store and publishes due posts, one at a time.
 *
 * Delivery is at-least-once: a post is marked only after LinkedIn accepts it,
 * so a failed markPosted means the same post goes out again on the next tick.
 * Run a single instance per store.
 */
export class PublishingScheduler {
    private readonly store: IPostRecordStore;
    private readonly poster: ILinkedInPosterService;
    private readonly intervalMs: number;
    private readonly runOnStart: boolean;
    private readonly defaultOffsetMinutes: number;
    private readonly now: () => Date;

    private lifecycle: SchedulerLifecycle = 'stopped';
    private inFlight: Promise<TickReport> | null = null;
    private timer: NodeJS.Timeout | null = null;
    /** Bumped by start() and stop(); timer chains from an older run stop rescheduling */
    private generation = 0;
    private anchorMs = 0;
    private nextTickAt: Date | null = null;
    private tickCount = 0;
    private lastTick: TickReport | null = null;

    constructor(store: IPostRecordStore, poster: ILinkedInPosterService, options: PublishingSchedulerOptions = {}) {
        const intervalMs = options.intervalMs ?? DEFAULT_SCHEDULER_INTERVAL_MS;
        if (!(intervalMs > 0)) {
            throw new Error('Scheduler interval must be a positive number of milliseconds');
        }
        this.store = store;
        this.poster = poster;
        this.intervalMs = intervalMs;
        this.runOnStart = options.runOnStart ?? true;
        this.defaultOffsetMinutes = options.defaultOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
        this.now = options.now ?? (() => new Date());
    }

    getStatus(): SchedulerStatus {
        return {
            lifecycle: this.lifecycle,
            activity: this.inFlight ? 'ticking' : 'idle',
            intervalMs: this.intervalMs,
            tickCount: this.tickCount,
            nextTickAt: this.nextTickAt,
            lastTick: this.lastTick ? copyReport(this.lastTick) : null,
        };
    }

    isRunning(): boolean {
        return this.lifecycle === 'running';
    }

    /**
     * Starts the fixed-cadence timer. Calling start() on a running scheduler does nothing.
     */
    start(): void {
        if (this.lifecycle === 'running') {
            return;
        }
        this.lifecycle = 'running';
        this.generation += 1;
        this.anchorMs = Date.now();
        console.log(`[Scheduler] Started, checking every ${Math.round(this.intervalMs / 1000)}s`);

        if (this.runOnStart) {
            void this.runTick();
        }
        this.scheduleNext();
    }

    /**
     * Stops the timer and waits for a tick in progress to finish its remaining records.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.nextTickAt = null;
        this.generation += 1;

        if (this.lifecycle === 'running') {
            this.lifecycle = 'stopped';
            console.log('[Scheduler] Stop requested');
        }

        if (this.inFlight) {
            await this.inFlight;
        }
    }

    /**
     * Runs one scan-select-publish-mark cycle now.
     * When a tick is already running, resolves with that tick's report instead.
     */
    runTick(): Promise<TickReport> {
        if (this.inFlight) {
            return this.inFlight;
        }

        this.inFlight = this.executeTick().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    private scheduleNext(): void {
        if (this.lifecycle !== 'running') {
            return;
        }
        if (this.timer) {
            clearTimeout(this.timer);
        }

        // Next slot on the grid anchored at start(), so slow ticks don't drift the cadence
        const generation = this.generation;
        const nowMs = Date.now();
        const elapsedSlots = Math.floor((nowMs - this.anchorMs) / this.intervalMs) + 1;
        const nextMs = this.anchorMs + elapsedSlots * this.intervalMs;
        this.nextTickAt = new Date(nextMs);

        this.timer = setTimeout(() => {
            this.timer = null;
            this.runTick()
                .catch((error) => {
                    console.error(`[Scheduler] Unexpected tick failure: ${describeError(error)}`);
                })
                .finally(() => {
                    if (generation === this.generation) {
                        this.scheduleNext();
                    }
                });
        }, nextMs - nowMs);
    }

    private async executeTick(): Promise<TickReport> {
        const report: TickReport = {
            startedAt: this.now(),
            finishedAt: this.now(),
            scanned: 0,
            due: 0,
            published: [],
            failed: [],
            unmarked: [],
            skipped: 0,
        };

        try {
            let records: PostRecord[];
            try {
                records = await this.store.scan();
            } catch (error) {
                report.aborted = describeError(error);
                console.error(`[Scheduler] Could not read post store, skipping this tick: ${report.aborted}`);
                return report;
            }

            const due = selectDuePosts(this.now(), records, { defaultOffsetMinutes: this.defaultOffsetMinutes });
            report.scanned = records.length;
            report.due = due.length;
            console.log(`[Scheduler] Checked ${records.length} posts, ${due.length} due`);

            for (const record of due) {
                await this.processRecord(record, report);
            }
            return report;
        } finally {
            report.finishedAt = this.now();
            this.tickCount += 1;
            this.lastTick = report;
        }
    }

    private async processRecord(record: PostRecord, report: TickReport): Promise<void> {
        const label = describeRecord(record);
        const content = record.content.trim();
        if (!content) {
            console.warn(`[Scheduler] ${label}: no content, leaving it pending`);
            report.skipped += 1;
            return;
        }

        let providerPostId: string;
        try {
            console.log(`[Scheduler] Publishing ${label}: ${content.substring(0, 50)}...`);
            providerPostId = await this.poster.publish(record.content, record.attachments);
        } catch (error) {
            const failure: FailedPost = {
                rowNumber: record.rowNumber,
                postNumber: record.postNumber,
                error: describeError(error),
                status: error instanceof PublishError ? error.status : undefined,
                transient: error instanceof PublishError ? error.transient : true,
            };
            report.failed.push(failure);
            console.error(
                `[Scheduler] ${label} failed (${failure.transient ? 'transient' : 'permanent'}), will retry next tick: ${failure.error}`
            );
            return;
        }

        const postedAt = formatDateTime(this.now(), this.defaultOffsetMinutes);
        try {
            await this.store.markPosted(record.rowNumber, postedAt);
            report.published.push({
                rowNumber: record.rowNumber,
                postNumber: record.postNumber,
                providerPostId,
                postedAt,
            });
            console.log(`[Scheduler] ${label} posted as ${providerPostId} at ${postedAt}`);
        } catch (error) {
            const message = describeError(error);
            report.unmarked.push({
                rowNumber: record.rowNumber,
                postNumber: record.postNumber,
                providerPostId,
                error: message,
            });
            console.error(
                `🚨 [Scheduler] DUPLICATE RISK: ${label} was published as ${providerPostId} ` +
                `but posted_at could not be written (${message}). ` +
                `Set posted_at by hand before the next tick or it will be published again.`
            );
        }
    }
}

function copyReport(report: TickReport): TickReport {
    return {
        ...report,
        startedAt: new Date(report.startedAt.getTime()),
        finishedAt: new Date(report.finishedAt.getTime()),
        published: report.published.map((post) => ({ ...post })),
        failed: report.failed.map((post) => ({ ...post })),
        unmarked: report.unmarked.map((post) => ({ ...post })),
    };
}

function describeRecord(record: PostRecord): string {
    const postNumber = record.postNumber === null ? '?' : String(record.postNumber);
    return `row ${record.rowNumber} (post #${postNumber})`;
}
