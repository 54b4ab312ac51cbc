import { ExtractionError } from '../core/ExporterError';
import { clamp, idsFor, isRecord, parseBoolean, parseHex, recordAt, toInteger, toNumber } from '../utils/Helpers';
import { DualWanMode, SwMode, UsbDeviceType, WIFI_BANDS } from '../types/router';
import { SECTION_NAMES } from '../types';
import type { DevicePayload, DeviceReport, LabelSet, MetricKind, MetricSample } from '../types';

const PREFIX = 'asus_router';

/**
 * Accumulates frozen samples that all share the base labels (`product_id`).
 * `null` values are skipped, so a missing field simply yields no line.
 */
class SampleBuilder {
    private readonly samples: MetricSample[] = [];

    constructor(private readonly base: LabelSet) {}

    public gauge(name: string, help: string, value: number | null, labels: LabelSet = {}): void {
        this.push('gauge', name, help, value, labels);
    }

    public counter(name: string, help: string, value: number | null, labels: LabelSet = {}): void {
        this.push('counter', name, help, value, labels);
    }

    /**
     * One gauge per possible value, 1 for the current one and 0 for the others.
     */
    public oneHot(name: string, help: string, labelName: string, values: readonly string[], current: string | null, labels: LabelSet = {}): void {
        for (const value of values) {
            this.gauge(name, help, value === current ? 1 : 0, { ...labels, [labelName]: value });
        }
    }

    public build(): MetricSample[] {
        return this.samples;
    }

    private push(kind: MetricKind, name: string, help: string, value: number | null, labels: LabelSet): void {
        if (value === null || Number.isNaN(value)) return;
        this.samples.push(Object.freeze({
            name: `${PREFIX}_${name}`,
            help,
            kind,
            labels: Object.freeze({ ...this.base, ...labels }),
            value
        }));
    }
}

/**
 * Resolves the operation mode the same way the router web UI does.
 */
export function resolveSwMode(swMode: number, psta: number | null, express: number): SwMode {
    if (((swMode === 2 && psta === 0) || (swMode === 3 && psta === 2)) && express === 0) return SwMode.RE;
    if (swMode === 3 && (psta === 0 || psta === null)) return SwMode.AP;
    if ((swMode === 3 && (psta === 1 || psta === 3) && express === 0) || (swMode === 2 && psta === 1 && express === 0)) {
        return SwMode.MB;
    }
    if (swMode === 2 && psta === 0 && express === 1) return SwMode.EW2;
    if (swMode === 2 && psta === 0 && express === 2) return SwMode.EW5;
    if (swMode === 5) return SwMode.HS;
    return SwMode.RT;
}

/**
 * Splits the `uptime` hook value, e.g. `Thu, 02 Jan 2025 10:00:00 +0100(86400 secs since boot)`.
 */
export function parseUptime(raw: unknown): { systemTime: number | null; bootSeconds: number } | null {
    if (typeof raw !== 'string') return null;
    const match = /^(.*?)\(\s*(\d+)\s+secs?/.exec(raw);
    if (!match) return null;

    const systemTime = Date.parse(match[1].trim());
    return {
        systemTime: Number.isNaN(systemTime) ? null : systemTime / 1000,
        bootSeconds: Number(match[2])
    };
}

/**
 * MetricExtractor
 * * Maps a DeviceReport into metric samples. Pure: no I/O, no state.
 *
 * Only the root `info` section is mandatory. Every other section, and every
 * field within a section, is optional: when absent or malformed its samples
 * are left out rather than failing the batch.
 */
export class MetricExtractor {

    /**
     * @param report What the current cycle read from the router.
     * @param previous The report of the last successful cycle, used for rates
     * (CPU usage percent needs two readings of the tick counters).
     * @throws ExtractionError when the root status section is missing or has no product id.
     */
    public static extract(report: DeviceReport, previous?: DeviceReport): MetricSample[] {
        const info = report.sections.info;
        if (!info) {
            throw new ExtractionError("Device report has no 'info' section", { section: 'info' });
        }

        const productId = typeof info.productid === 'string' ? info.productid.trim() : '';
        if (!productId) {
            throw new ExtractionError('Router did not report a product id', { section: 'info', field: 'productid' });
        }

        const out = new SampleBuilder({ product_id: productId });
        const { sections } = report;

        MetricExtractor.extractInfo(out, info);
        if (sections.uptime) MetricExtractor.extractUptime(out, sections.uptime);
        if (sections.temperature) MetricExtractor.extractTemperature(out, sections.temperature);
        if (sections.cpu) MetricExtractor.extractCpu(out, sections.cpu, previous?.sections.cpu);
        if (sections.memory) MetricExtractor.extractMemory(out, sections.memory);
        if (sections.netdev) MetricExtractor.extractNetdev(out, sections.netdev);
        if (sections.bands) MetricExtractor.extractBands(out, sections.bands);
        if (sections.usb) MetricExtractor.extractUsb(out, sections.usb);
        if (sections.dualwan) MetricExtractor.extractDualWan(out, sections.dualwan);
        MetricExtractor.extractSectionStatus(out, report);

        return out.build();
    }

    private static extractInfo(out: SampleBuilder, info: DevicePayload): void {
        const firmver = typeof info.firmver === 'string' ? info.firmver : '';
        const extendno = typeof info.extendno === 'string' ? info.extendno : '';

        out.gauge('info', 'Router information (static details such as model, firmware and LAN address)', 1, {
            firmware: extendno ? `${firmver}_${extendno}` : firmver,
            hostname: typeof info.lan_hostname === 'string' ? info.lan_hostname : '',
            mac: typeof info.lan_hwaddr === 'string' ? info.lan_hwaddr : ''
        });

        const swMode = toInteger(info.sw_mode);
        if (swMode !== null) {
            const mode = resolveSwMode(swMode, toInteger(info.wlc_psta), toInteger(info.wlc_express) ?? 0);
            out.oneHot('sw_mode', 'Router operation mode (one-hot)', 'sw_mode',
                Object.keys(SwMode), MetricExtractor.swModeName(mode));
        }
    }

    private static extractUptime(out: SampleBuilder, payload: DevicePayload): void {
        const uptime = parseUptime(payload.uptime);
        if (!uptime) return;

        out.gauge('uptime_seconds', 'Router uptime in seconds', uptime.bootSeconds);
        out.gauge('system_time_seconds', 'Router wall clock as a Unix timestamp', uptime.systemTime);
    }

    private static extractTemperature(out: SampleBuilder, payload: DevicePayload): void {
        out.gauge('cpu_temperature_celsius', 'CPU temperature in Celsius', toNumber(payload.curr_cpuTemp));
    }

    private static extractCpu(out: SampleBuilder, payload: DevicePayload, previousPayload?: DevicePayload): void {
        const cpus = recordAt(payload, 'cpu_usage');
        const previous = recordAt(previousPayload, 'cpu_usage');

        // cpu_id is the zero-based position, firmware ids start at 1
        for (const [index, id] of idsFor('cpu', Object.keys(cpus)).entries()) {
            const labels = { cpu_id: String(index) };
            const usage = toNumber(cpus[`cpu${id}_usage`]);
            const total = toNumber(cpus[`cpu${id}_total`]);

            out.counter('cpu_usage_total', 'Busy time (user+system+irq+...) in ticks since boot', usage, labels);
            out.counter('cpu_total', 'Total time in ticks since boot', total, labels);

            const prevUsage = toNumber(previous[`cpu${id}_usage`]);
            const prevTotal = toNumber(previous[`cpu${id}_total`]);
            if (usage === null || total === null || prevUsage === null || prevTotal === null) continue;

            const deltaUsage = usage - prevUsage;
            const deltaTotal = total - prevTotal;
            // Counter reset (reboot) or no progress: no meaningful percentage
            if (deltaTotal <= 0 || deltaUsage < 0) continue;

            out.gauge('cpu_usage_percent', 'CPU usage percentage between the last two readings',
                clamp((deltaUsage / deltaTotal) * 100, 0, 100), labels);
        }
    }

    private static extractMemory(out: SampleBuilder, payload: DevicePayload): void {
        const memory = recordAt(payload, 'memory_usage');
        const toBytes = (kb: number | null) => kb === null ? null : kb * 1024;

        const total = toBytes(toNumber(memory.mem_total));
        const used = toBytes(toNumber(memory.mem_used));
        const free = toBytes(toNumber(memory.mem_free));

        out.gauge('memory_total_bytes', 'Total memory in bytes', total);
        out.gauge('memory_used_bytes', 'Used memory in bytes', used);
        out.gauge('memory_free_bytes', 'Free memory in bytes', free);

        if (total !== null && total > 0 && used !== null) {
            out.gauge('memory_used_percent', 'Memory usage percentage (used / total * 100)', clamp((used / total) * 100, 0, 100));
        }
    }

    private static extractNetdev(out: SampleBuilder, payload: DevicePayload): void {
        const netdev = recordAt(payload, 'netdev');

        for (const [prefix, kind] of [['BRIDGE', 'bridge'], ['WIRED', 'wired']] as const) {
            out.counter(`netdev_${kind}_transmit_bytes_total`, `Total bytes transmitted on ${kind} interface`, parseHex(netdev[`${prefix}_tx`]));
            out.counter(`netdev_${kind}_receive_bytes_total`, `Total bytes received on ${kind} interface`, parseHex(netdev[`${prefix}_rx`]));
        }

        for (const [prefix, kind] of [['INTERNET', 'internet'], ['WIRELESS', 'wireless']] as const) {
            for (const id of idsFor(prefix, Object.keys(netdev))) {
                const labels = { interface_id: String(id) };
                out.counter(`netdev_${kind}_transmit_bytes_total`, `Total bytes transmitted on ${kind} interface`,
                    parseHex(netdev[`${prefix}${id}_tx`]), labels);
                out.counter(`netdev_${kind}_receive_bytes_total`, `Total bytes received on ${kind} interface`,
                    parseHex(netdev[`${prefix}${id}_rx`]), labels);
            }
        }
    }

    private static extractBands(out: SampleBuilder, payload: DevicePayload): void {
        const bands = payload.wl_nband_info;
        if (!Array.isArray(bands)) return;

        const counts = new Map<string, number>();
        for (const band of bands) {
            const name = WIFI_BANDS[String(band).trim()];
            if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
        }

        for (const name of Object.values(WIFI_BANDS)) {
            out.gauge('wireless_bands', 'Number of radios per wireless band', counts.get(name) ?? 0, { band: name });
        }
    }

    private static extractUsb(out: SampleBuilder, payload: DevicePayload): void {
        const devices = payload.show_usb_path;
        if (!Array.isArray(devices)) return;

        for (const type of Object.values(UsbDeviceType)) {
            const count = devices.filter(device => String(device).trim().toLowerCase() === type).length;
            out.gauge('usb_devices', 'Number of plugged USB devices per type', count, { type });
        }
    }

    private static extractDualWan(out: SampleBuilder, payload: DevicePayload): void {
        const rawModes = typeof payload.wans_dualwan === 'string' ? payload.wans_dualwan.trim() : '';
        const modes = rawModes ? rawModes.split(/\s+/).map(MetricExtractor.toDualWanMode) : [];
        const caps = isRecord(payload.get_ui_support) ? payload.get_ui_support : {};
        const activeUnit = toInteger(payload.get_wan_unit);

        if (modes.length > 0) {
            const enabled = parseBoolean(caps.dualwan) === true && !modes.includes(DualWanMode.NONE);
            out.gauge('dualwan_enabled', 'Dual WAN enabled (0/1)', enabled ? 1 : 0);
        }

        modes.forEach((mode, unit) => {
            const labels = { unit: String(unit) };
            const unitEnabled = parseBoolean(payload[`wan${unit}_enable`]);

            out.gauge('wan_enabled', 'WAN unit enabled (0/1)', unitEnabled === null ? null : Number(unitEnabled), labels);
            out.gauge('wan_active', 'WAN unit currently carrying traffic (0/1)', activeUnit === null ? null : Number(activeUnit === unit), labels);
            out.oneHot('dualwan_mode', 'Dual WAN interface type per unit (one-hot)', 'mode', Object.values(DualWanMode), mode, labels);
        });
    }

    private static extractSectionStatus(out: SampleBuilder, report: DeviceReport): void {
        for (const section of SECTION_NAMES) {
            const read = report.sections[section] !== undefined;
            if (!read && report.failures[section] === undefined) continue;

            out.gauge('probe_section_success', 'Whether the section was read successfully in the last cycle (0/1)',
                read ? 1 : 0, { section });
        }
    }

    private static toDualWanMode(part: string): DualWanMode {
        const normalized = part.toLowerCase();
        const known = Object.values(DualWanMode).find(mode => mode === normalized);
        return known ?? DualWanMode.NONE;
    }

    private static swModeName(mode: SwMode): string {
        const entry = Object.entries(SwMode).find(([, value]) => value === mode);
        return entry ? entry[0] : mode;
    }
}
