import type { CacheHealth, LabelSet, MetricKind, MetricSample, Snapshot } from '../types';

export const CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

const PREFIX = 'asus_router_';

interface MetricFamily {
    name: string;
    help: string;
    kind: MetricKind;
    samples: MetricSample[];
}

/**
 * PrometheusExporter
 * * Transformation Engine.
 * * Converts a Snapshot into the Prometheus text exposition format.
 * * Appends the exporter's own health metrics after the router samples.
 */
export class PrometheusExporter {

    /**
     * Renders the snapshot and its health as one exposition payload.
     * Samples sharing a name are grouped under a single HELP/TYPE header,
     * in order of first appearance.
     */
    public static render(snapshot: Snapshot, health: CacheHealth): string {
        const families = PrometheusExporter.group([
            ...snapshot.samples,
            ...PrometheusExporter.selfMetrics(snapshot, health)
        ]);

        let output = '';
        for (const family of families) {
            output += `# HELP ${family.name} ${PrometheusExporter.escapeHelp(family.help)}\n`;
            output += `# TYPE ${family.name} ${family.kind}\n`;
            for (const sample of family.samples) {
                output += `${sample.name}${PrometheusExporter.formatLabels(sample.labels)} ${PrometheusExporter.formatValue(sample.value)}\n`;
            }
        }
        return output;
    }

    /**
     * Exporter self-metrics, derived from the snapshot metadata only.
     */
    public static selfMetrics(snapshot: Snapshot, health: CacheHealth): MetricSample[] {
        const sample = (kind: MetricKind) => (name: string, help: string, value: number): MetricSample => ({
            name: PREFIX + name,
            help,
            kind,
            labels: {},
            value
        });
        const gauge = sample('gauge');
        const counter = sample('counter');

        const samples = [
            gauge('up', 'Whether the last refresh cycle succeeded (0/1)', snapshot.success ? 1 : 0),
            gauge('snapshot_age_seconds', 'Seconds since the served samples were read from the router', health.ageSeconds),
            gauge('refresh_consecutive_failures', 'Number of refresh cycles failed in a row', snapshot.consecutiveFailures),
            counter('scrape_errors_total', 'Refresh cycles that failed since the exporter started', snapshot.totalFailures),
            gauge('exporter_healthy', 'Whether the exporter reports itself healthy (0/1)', health.status === 'healthy' ? 1 : 0)
        ];

        if (snapshot.durationMs !== null) {
            samples.push(gauge('last_refresh_duration_seconds', 'Duration of the last refresh cycle', snapshot.durationMs / 1000));
        }
        return samples;
    }

    public static formatLabels(labels: LabelSet): string {
        const parts = Object.entries(labels).map(([key, value]) => `${key}="${PrometheusExporter.escapeLabel(value)}"`);
        return parts.length > 0 ? `{${parts.join(',')}}` : '';
    }

    public static escapeLabel(value: string): string {
        return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
    }

    public static formatValue(value: number): string {
        if (Number.isNaN(value)) return 'NaN';
        if (value === Number.POSITIVE_INFINITY) return '+Inf';
        if (value === Number.NEGATIVE_INFINITY) return '-Inf';
        return String(value);
    }

    // HELP text escapes backslash and newline only
    private static escapeHelp(help: string): string {
        return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
    }

    private static group(samples: readonly MetricSample[]): MetricFamily[] {
        const families = new Map<string, MetricFamily>();
        for (const sample of samples) {
            const family = families.get(sample.name);
            if (family) {
                family.samples.push(sample);
            } else {
                families.set(sample.name, { name: sample.name, help: sample.help, kind: sample.kind, samples: [sample] });
            }
        }
        return [...families.values()];
    }
}
