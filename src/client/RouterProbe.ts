import { DeviceError, AuthError, TransportError } from '../core/ExporterError';
import { Logger } from '../utils/Logger';
import { EndpointFetcher } from './RouterClient';
import { EndpointSpec, hook, nvram, page } from './Endpoints';
import type { DevicePayload, DeviceReport, SectionName } from '../types';

export interface SectionPlan {
    readonly section: SectionName;
    /** A failed required section fails the whole cycle. */
    readonly required: boolean;
    /** Endpoints whose payloads are merged into the section payload. */
    readonly endpoints: readonly EndpointSpec[];
}

/**
 * Anything able to produce one DeviceReport per refresh cycle.
 */
export interface DeviceSource {
    collect(signal?: AbortSignal): Promise<DeviceReport>;
}

export const INFO_NVRAM_KEYS = [
    'productid', 'lan_hwaddr', 'lan_hostname', 'firmver', 'extendno',
    'sw_mode', 'wlc_psta', 'wlc_express'
] as const;

/**
 * What the exporter reads on every cycle, in order.
 * `info` is the root status section: without a product id nothing can be labelled.
 */
export const DEFAULT_SECTIONS: readonly SectionPlan[] = [
    { section: 'info', required: true, endpoints: [nvram(...INFO_NVRAM_KEYS)] },
    { section: 'uptime', required: false, endpoints: [hook('uptime')] },
    { section: 'temperature', required: false, endpoints: [page('/ajax_coretmp.asp')] },
    { section: 'cpu', required: false, endpoints: [hook('cpu_usage')] },
    { section: 'memory', required: false, endpoints: [hook('memory_usage')] },
    { section: 'netdev', required: false, endpoints: [hook('netdev', 'appobj')] },
    { section: 'bands', required: false, endpoints: [hook('wl_nband_info')] },
    { section: 'usb', required: false, endpoints: [hook('show_usb_path')] },
    {
        section: 'dualwan',
        required: false,
        endpoints: [nvram('wans_dualwan', 'wan0_enable', 'wan1_enable'), hook('get_wan_unit'), hook('get_ui_support')]
    }
];

/**
 * RouterProbe
 * * Fetch stage of a refresh cycle.
 * * Reads every section sequentially, one request in flight at a time,
 * * and assembles one DeviceReport.
 *
 * Failure policy:
 * - required section fails: the error propagates.
 * - `TransportError` anywhere: propagates, the router is unreachable and
 *   the remaining sections would only time out one after the other.
 * - `DeviceError` / `AuthError` on an optional section: recorded in
 *   `failures`, the section is left out and the probe continues.
 */
export class RouterProbe implements DeviceSource {
    private readonly log = new Logger('RouterProbe');

    constructor(
        private readonly client: EndpointFetcher,
        private readonly sections: readonly SectionPlan[] = DEFAULT_SECTIONS,
        private readonly clock: () => number = Date.now
    ) {}

    public async collect(signal?: AbortSignal): Promise<DeviceReport> {
        const sections: Partial<Record<SectionName, DevicePayload>> = {};
        const failures: Partial<Record<SectionName, string>> = {};

        for (const plan of this.sections) {
            try {
                sections[plan.section] = await this.readSection(plan, signal);
            } catch (error) {
                if (!this.isTolerated(plan, error) || signal?.aborted) throw error;

                const message = error instanceof Error ? error.message : String(error);
                failures[plan.section] = message;
                this.log.warn(`Section '${plan.section}' skipped: ${message}`);
            }
        }

        return { receivedAt: this.clock(), sections, failures };
    }

    private async readSection(plan: SectionPlan, signal?: AbortSignal): Promise<DevicePayload> {
        const merged: Record<string, unknown> = {};
        for (const endpoint of plan.endpoints) {
            const response = await this.client.fetch(endpoint, { signal });
            Object.assign(merged, response.payload);
        }
        return merged;
    }

    private isTolerated(plan: SectionPlan, error: unknown): boolean {
        if (plan.required || error instanceof TransportError) return false;
        return error instanceof DeviceError || error instanceof AuthError;
    }
}
