/**
 * Shared data model of the exporter.
 */

export type MetricKind = 'counter' | 'gauge';

export type LabelSet = Readonly<Record<string, string>>;

/**
 * One exposition line: `name{labels} value`.
 * Frozen once created.
 */
export interface MetricSample {
    readonly name: string;
    readonly help: string;
    readonly kind: MetricKind;
    readonly labels: LabelSet;
    readonly value: number;
}

/**
 * Decoded payload of one endpoint (JSON object or `key = "value";` page).
 * Keys follow the firmware naming, nothing is renamed at this stage.
 */
export type DevicePayload = Readonly<Record<string, unknown>>;

/**
 * Result of one `RouterClient.fetch()` call.
 */
export interface RawDeviceResponse {
    /** Human readable endpoint id, e.g. `hook:cpu_usage()` */
    readonly endpoint: string;
    readonly receivedAt: number;
    readonly payload: DevicePayload;
}

export type SectionName =
    | 'info'
    | 'uptime'
    | 'temperature'
    | 'cpu'
    | 'memory'
    | 'netdev'
    | 'bands'
    | 'usb'
    | 'dualwan';

export const SECTION_NAMES: readonly SectionName[] = [
    'info', 'uptime', 'temperature', 'cpu', 'memory', 'netdev', 'bands', 'usb', 'dualwan'
];

/**
 * Everything one refresh cycle read from the router, grouped by section.
 * Optional sections that failed are listed in `failures` and absent from `sections`.
 */
export interface DeviceReport {
    readonly receivedAt: number;
    readonly sections: Readonly<Partial<Record<SectionName, DevicePayload>>>;
    readonly failures: Readonly<Partial<Record<SectionName, string>>>;
}

export interface SnapshotError {
    readonly code: string;
    readonly message: string;
    readonly at: number;
}

/**
 * The published result of the latest refresh cycle.
 */
export interface Snapshot {
    readonly samples: readonly MetricSample[];
    /** When the samples were read from the device; null until the first success. */
    readonly capturedAt: number | null;
    /** When the latest cycle (successful or not) finished. */
    readonly attemptedAt: number | null;
    readonly success: boolean;
    readonly error: SnapshotError | null;
    readonly consecutiveFailures: number;
    /** Failed cycles since the process started; never reset. */
    readonly totalFailures: number;
    readonly durationMs: number | null;
}

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface CacheHealth {
    readonly status: HealthStatus;
    /** Seconds since `capturedAt`; Infinity before the first success. */
    readonly ageSeconds: number;
    readonly success: boolean;
    readonly consecutiveFailures: number;
    readonly lastError: SnapshotError | null;
}

export * from './router';
