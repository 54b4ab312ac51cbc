import { EventEmitter } from 'events';
import { ExponentialBackoff, BackoffOptions } from '../core/Backoff';
import { ExporterError } from '../core/ExporterError';
import { SnapshotCache } from '../core/SnapshotCache';
import { DeviceSource } from '../client/RouterProbe';
import { MetricExtractor } from './MetricExtractor';
import { Logger } from '../utils/Logger';
import type { DeviceReport, MetricSample, Snapshot } from '../types';

/**
 * RefreshState Enum
 * Stages of one refresh cycle.
 */
export enum RefreshState {
    /** Not started, or stopped. No timer is armed. */
    STOPPED,
    /** Waiting for the next tick. */
    IDLE,
    /** Reading the device. */
    FETCHING,
    /** Turning the report into samples. */
    EXTRACTING,
    /** Swapping the new snapshot into the cache. */
    PUBLISHING,
    /** Waiting out the delay after a failed cycle. */
    BACKOFF
}

export type ExtractFn = (report: DeviceReport, previous?: DeviceReport) => MetricSample[];

export interface RefreshSchedulerOptions {
    /** Delay between successful cycles, in ms. */
    refreshIntervalMs: number;
    backoff: BackoffOptions;
    /** Consecutive failures at which the error is escalated once. */
    failureThreshold: number;
    clock?: () => number;
    extract?: ExtractFn;
}

export declare interface RefreshScheduler {
    on(event: 'state', listener: (state: RefreshState) => void): this;
    on(event: 'refreshed', listener: (snapshot: Snapshot) => void): this;
    on(event: 'failed', listener: (error: ExporterError, snapshot: Snapshot) => void): this;
}

/**
 * RefreshScheduler
 * * Drives the fetch → extract → publish pipeline on a timer.
 * * At most one cycle runs at a time; ticks arriving during a cycle are dropped.
 * * Failed cycles publish a failure snapshot that keeps the previous samples,
 *   then wait `min(base * 2^(n-1), ceiling)` before the next attempt.
 *
 * Scrapers never see this class, they only read the SnapshotCache.
 */
export class RefreshScheduler extends EventEmitter {
    private readonly log = new Logger('RefreshScheduler');

    private state: RefreshState = RefreshState.STOPPED;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<boolean> | null = null;
    private controller: AbortController | null = null;
    private running = false;
    /** Bumped by start(), so a cycle left over from an earlier run does not re-arm the timer. */
    private generation = 0;
    /** Delay chosen by the last failed cycle. */
    private backoffDelay = 0;

    /** Last report that produced a published snapshot. */
    private lastReport: DeviceReport | undefined;

    private readonly backoff: ExponentialBackoff;
    private readonly refreshIntervalMs: number;
    private readonly failureThreshold: number;
    private readonly clock: () => number;
    private readonly extract: ExtractFn;

    constructor(
        private readonly source: DeviceSource,
        private readonly cache: SnapshotCache,
        options: RefreshSchedulerOptions
    ) {
        super();
        this.refreshIntervalMs = options.refreshIntervalMs;
        this.failureThreshold = options.failureThreshold;
        this.backoff = new ExponentialBackoff(options.backoff);
        this.clock = options.clock || Date.now;
        this.extract = options.extract || ((report, previous) => MetricExtractor.extract(report, previous));
    }

    public getState(): RefreshState {
        return this.state;
    }

    public get isRunning(): boolean {
        return this.running;
    }

    /**
     * Starts the loop. The first cycle runs immediately.
     */
    public start(): void {
        if (this.running) return;
        this.running = true;
        this.generation++;
        this.transitionTo(RefreshState.IDLE);
        this.log.info(`Started (interval ${this.refreshIntervalMs}ms)`);
        this.tick();
    }

    /**
     * Runs one cycle now.
     * Resolves `true` when a snapshot was published with fresh samples,
     * `false` when the cycle failed, was aborted or was dropped because another one is running.
     */
    public refresh(): Promise<boolean> {
        if (this.inFlight) {
            this.log.debug('Refresh dropped: a cycle is already in flight');
            return Promise.resolve(false);
        }

        const controller = new AbortController();
        this.controller = controller;

        const cycle = this.runCycle(controller.signal).finally(() => {
            this.inFlight = null;
            if (this.controller === controller) this.controller = null;
        });
        this.inFlight = cycle;
        return cycle;
    }

    /**
     * Stops the loop.
     * An in-flight cycle gets `graceMs` to finish; after that it is aborted and publishes nothing.
     */
    public async stop(graceMs: number = 0): Promise<void> {
        this.running = false;
        this.clearTimer();

        const cycle = this.inFlight;
        if (cycle) {
            let graceTimer: NodeJS.Timeout | undefined;
            const graceExpired = new Promise<'timeout'>(resolve => {
                graceTimer = setTimeout(() => resolve('timeout'), graceMs);
            });

            const outcome = await Promise.race([cycle.then(() => 'done' as const), graceExpired]);
            clearTimeout(graceTimer);

            if (outcome === 'timeout') {
                this.log.warn(`Cycle still running after ${graceMs}ms grace, aborting`);
                this.controller?.abort();
            }
        }

        this.transitionTo(RefreshState.STOPPED);
        this.log.info('Stopped');
    }

    private tick(): void {
        this.timer = null;
        if (!this.running) return;

        if (this.inFlight) {
            this.log.debug('Tick dropped: a cycle is already in flight');
            this.schedule(this.refreshIntervalMs);
            return;
        }

        const generation = this.generation;
        const isCurrent = () => this.running && this.generation === generation;

        this.refresh()
            .then(ok => {
                if (!isCurrent()) return;
                this.schedule(ok ? this.refreshIntervalMs : this.backoffDelay);
            })
            .catch((error: unknown) => {
                this.log.error(`Refresh loop failed: ${ExporterError.wrap(error).message}`);
                if (isCurrent()) this.schedule(this.backoff.peek());
            });
    }

    private schedule(delayMs: number): void {
        this.clearTimer();
        this.timer = setTimeout(() => this.tick(), delayMs);
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private async runCycle(signal: AbortSignal): Promise<boolean> {
        const startedAt = this.clock();

        try {
            this.transitionTo(RefreshState.FETCHING);
            const report = await this.source.collect(signal);
            if (signal.aborted) return this.onAborted();

            this.transitionTo(RefreshState.EXTRACTING);
            const samples = this.extract(report, this.lastReport);

            this.transitionTo(RefreshState.PUBLISHING);
            const finishedAt = this.clock();
            const snapshot: Snapshot = {
                samples,
                capturedAt: report.receivedAt,
                attemptedAt: finishedAt,
                success: true,
                error: null,
                consecutiveFailures: 0,
                totalFailures: this.cache.read().totalFailures,
                durationMs: finishedAt - startedAt
            };
            this.cache.publish(snapshot);
            this.lastReport = report;

            if (this.backoff.failures > 0) {
                this.log.info(`Recovered after ${this.backoff.failures} failed cycle(s)`);
            }
            this.backoff.reset();
            this.transitionTo(this.running ? RefreshState.IDLE : RefreshState.STOPPED);
        } catch (raw) {
            if (signal.aborted) return this.onAborted();
            const error = ExporterError.wrap(raw);
            this.onFailure(error, startedAt);
            this.notify('failed', error, this.cache.read());
            return false;
        }

        this.notify('refreshed', this.cache.read());
        return true;
    }

    private onFailure(error: ExporterError, startedAt: number): void {
        const previous = this.cache.read();
        const finishedAt = this.clock();
        const consecutiveFailures = previous.consecutiveFailures + 1;

        this.cache.publish({
            samples: previous.samples,
            capturedAt: previous.capturedAt,
            attemptedAt: finishedAt,
            success: false,
            error: { code: error.code, message: error.message, at: finishedAt },
            consecutiveFailures,
            totalFailures: previous.totalFailures + 1,
            durationMs: finishedAt - startedAt
        });

        this.backoffDelay = this.backoff.next();
        this.log.warn(`Refresh failed (${consecutiveFailures} in a row), next attempt in ${this.backoffDelay}ms`, error.toJSON());

        if (consecutiveFailures === this.failureThreshold) {
            this.log.error(`${consecutiveFailures} consecutive refresh failures, exporter is critical: ${error.message}`);
        }

        this.transitionTo(this.running ? RefreshState.BACKOFF : RefreshState.STOPPED);
    }

    private onAborted(): false {
        this.log.info('Cycle aborted, nothing published');
        // start() may have been called again while the aborted cycle was settling
        this.transitionTo(this.running ? RefreshState.IDLE : RefreshState.STOPPED);
        return false;
    }

    private transitionTo(next: RefreshState): void {
        if (this.state === next) return;
        this.state = next;
        this.log.debug(`State changed to: ${RefreshState[next]}`);
        this.notify('state', next);
    }

    /**
     * A throwing listener is logged and never changes the outcome of a cycle.
     */
    private notify(event: 'state' | 'refreshed' | 'failed', ...args: unknown[]): void {
        try {
            this.emit(event, ...args);
        } catch (error) {
            this.log.error(`'${event}' listener failed: ${ExporterError.wrap(error).message}`);
        }
    }
}
