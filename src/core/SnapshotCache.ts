import type { CacheHealth, HealthStatus, MetricSample, Snapshot } from '../types';

export interface SnapshotCacheOptions {
    /** Age beyond which the snapshot is reported degraded, in ms. */
    stalenessCeilingMs: number;
    /** Consecutive failed cycles that escalate health to `critical`. */
    failureThreshold: number;
    clock?: () => number;
}

/**
 * SnapshotCache
 * * Holds the one current Snapshot.
 *
 * Readers get the published object itself: it is deep-frozen, and `publish()`
 * swaps the reference instead of touching it, so a reader holding a snapshot
 * keeps a consistent view however many publications happen afterwards.
 * `read()` never triggers I/O.
 */
export class SnapshotCache {
    private current: Snapshot = SnapshotCache.empty();

    private readonly stalenessCeilingMs: number;
    private readonly failureThreshold: number;
    private readonly clock: () => number;

    constructor(options: SnapshotCacheOptions) {
        this.stalenessCeilingMs = options.stalenessCeilingMs;
        this.failureThreshold = options.failureThreshold;
        this.clock = options.clock || Date.now;
    }

    /**
     * The snapshot published before the first refresh cycle completes.
     */
    public static empty(): Snapshot {
        return Object.freeze({
            samples: Object.freeze([]),
            capturedAt: null,
            attemptedAt: null,
            success: false,
            error: null,
            consecutiveFailures: 0,
            totalFailures: 0,
            durationMs: null
        });
    }

    public read(): Snapshot {
        return this.current;
    }

    /**
     * Atomically replaces the current snapshot.
     */
    public publish(next: Snapshot): void {
        this.current = SnapshotCache.freeze(next);
    }

    /**
     * Milliseconds since the current samples were captured (Infinity when never captured).
     */
    public age(now: number = this.clock()): number {
        const { capturedAt } = this.current;
        return capturedAt === null ? Number.POSITIVE_INFINITY : Math.max(0, now - capturedAt);
    }

    public health(now: number = this.clock()): CacheHealth {
        const snapshot = this.current;
        const ageMs = this.age(now);

        return {
            status: this.classify(snapshot, ageMs),
            ageSeconds: ageMs / 1000,
            success: snapshot.success,
            consecutiveFailures: snapshot.consecutiveFailures,
            lastError: snapshot.error
        };
    }

    private classify(snapshot: Snapshot, ageMs: number): HealthStatus {
        if (snapshot.consecutiveFailures >= this.failureThreshold) return 'critical';
        if (!snapshot.success || ageMs > this.stalenessCeilingMs) return 'degraded';
        return 'healthy';
    }

    private static freeze(snapshot: Snapshot): Snapshot {
        if (SnapshotCache.isDeepFrozen(snapshot)) return snapshot;

        const samples: readonly MetricSample[] = Object.freeze(snapshot.samples.map(sample =>
            SnapshotCache.isSampleFrozen(sample) ? sample : Object.freeze({ ...sample, labels: Object.freeze({ ...sample.labels }) })
        ));

        return Object.freeze({
            ...snapshot,
            samples,
            error: snapshot.error ? Object.freeze({ ...snapshot.error }) : null
        });
    }

    private static isSampleFrozen(sample: MetricSample): boolean {
        return Object.isFrozen(sample) && Object.isFrozen(sample.labels);
    }

    // True for anything this cache has already published
    private static isDeepFrozen(snapshot: Snapshot): boolean {
        return Object.isFrozen(snapshot)
            && Object.isFrozen(snapshot.samples)
            && (snapshot.error === null || Object.isFrozen(snapshot.error))
            && snapshot.samples.every(SnapshotCache.isSampleFrozen);
    }
}
