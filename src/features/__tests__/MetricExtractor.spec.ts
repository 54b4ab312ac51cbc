import { describe, it, expect } from 'vitest';
import { MetricExtractor, parseUptime, resolveSwMode } from '../MetricExtractor';
import { ExtractionError } from '../../core/ExporterError';
import { SwMode } from '../../types/router';
import type { DevicePayload, DeviceReport, MetricSample, SectionName } from '../../types';

const INFO: DevicePayload = {
    productid: 'RT-AX88U',
    lan_hwaddr: '04:D9:F5:00:00:01',
    lan_hostname: 'router',
    firmver: '3.0.0.4',
    extendno: '388_24243',
    sw_mode: '1',
    wlc_psta: '0',
    wlc_express: '0'
};

function report(sections: Partial<Record<SectionName, DevicePayload>>, failures: Partial<Record<SectionName, string>> = {}): DeviceReport {
    return { receivedAt: 1_000, sections, failures };
}

function find(samples: MetricSample[], name: string, labels: Record<string, string> = {}): MetricSample | undefined {
    return samples.find(sample =>
        sample.name === name && Object.entries(labels).every(([key, value]) => sample.labels[key] === value)
    );
}

function valueOf(samples: MetricSample[], name: string, labels: Record<string, string> = {}): number | undefined {
    return find(samples, name, labels)?.value;
}

describe('resolveSwMode', () => {
    it.each([
        [1, 0, 0, SwMode.RT],
        [2, 0, 0, SwMode.RE],
        [3, 2, 0, SwMode.RE],
        [3, 0, 0, SwMode.AP],
        [3, null, 0, SwMode.AP],
        [3, 1, 0, SwMode.MB],
        [3, 3, 0, SwMode.MB],
        [2, 1, 0, SwMode.MB],
        [2, 0, 1, SwMode.EW2],
        [2, 0, 2, SwMode.EW5],
        [5, 0, 0, SwMode.HS]
    ])('sw_mode=%s psta=%s express=%s -> %s', (swMode, psta, express, expected) => {
        expect(resolveSwMode(swMode, psta, express)).toBe(expected);
    });
});

describe('parseUptime', () => {
    it('splits wall clock and seconds since boot', () => {
        expect(parseUptime('Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)')).toEqual({
            systemTime: 1735812000,
            bootSeconds: 3600
        });
    });

    it('keeps the boot seconds when the date is unreadable', () => {
        expect(parseUptime('garbage(12 secs since boot)')).toEqual({ systemTime: null, bootSeconds: 12 });
    });

    it('returns null for unexpected shapes', () => {
        expect(parseUptime('no counter here')).toBeNull();
        expect(parseUptime(12)).toBeNull();
    });
});

describe('MetricExtractor', () => {
    it('fails when the root info section is missing', () => {
        expect(() => MetricExtractor.extract(report({ uptime: { uptime: 'x(1 secs since boot)' } }))).toThrow(ExtractionError);
    });

    it('fails when the product id is empty', () => {
        expect(() => MetricExtractor.extract(report({ info: { ...INFO, productid: ' ' } })))
            .toThrow('Router did not report a product id');
    });

    it('emits the info and switch-mode samples from the root section alone', () => {
        const samples = MetricExtractor.extract(report({ info: INFO }));

        expect(find(samples, 'asus_router_info')).toEqual({
            name: 'asus_router_info',
            help: 'Router information (static details such as model, firmware and LAN address)',
            kind: 'gauge',
            labels: { product_id: 'RT-AX88U', firmware: '3.0.0.4_388_24243', hostname: 'router', mac: '04:D9:F5:00:00:01' },
            value: 1
        });

        const modes = samples.filter(sample => sample.name === 'asus_router_sw_mode');
        expect(modes.map(sample => [sample.labels.sw_mode, sample.value])).toEqual([
            ['RT', 1], ['RE', 0], ['AP', 0], ['MB', 0], ['EW2', 0], ['EW5', 0], ['HS', 0]
        ]);
        expect(samples).toHaveLength(1 + 7 + 1);
        expect(valueOf(samples, 'asus_router_probe_section_success', { section: 'info' })).toBe(1);
    });

    it('returns frozen samples', () => {
        const [sample] = MetricExtractor.extract(report({ info: INFO }));
        expect(Object.isFrozen(sample)).toBe(true);
        expect(Object.isFrozen(sample.labels)).toBe(true);
    });

    it('maps every optional section', () => {
        const samples = MetricExtractor.extract(report({
            info: INFO,
            uptime: { uptime: 'Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)' },
            temperature: { curr_cpuTemp: '61.2' },
            memory: { memory_usage: { mem_total: '262144', mem_used: '131072', mem_free: '131072' } },
            netdev: {
                netdev: {
                    BRIDGE_tx: '0x10', BRIDGE_rx: '0x20', WIRED_tx: 'zz',
                    INTERNET0_tx: '0xff', INTERNET0_rx: '0x100',
                    WIRELESS0_tx: '0x1', WIRELESS1_rx: '0x2'
                }
            },
            bands: { wl_nband_info: ['2', '1', '1'] },
            usb: { show_usb_path: ['storage', 'Storage', 'printer'] },
            dualwan: {
                wans_dualwan: 'wan usb', wan0_enable: '1', wan1_enable: '0',
                get_wan_unit: 0, get_ui_support: { dualwan: 1 }
            }
        }));

        expect(valueOf(samples, 'asus_router_uptime_seconds')).toBe(3600);
        expect(valueOf(samples, 'asus_router_system_time_seconds')).toBe(1735812000);
        expect(valueOf(samples, 'asus_router_cpu_temperature_celsius')).toBe(61.2);

        expect(valueOf(samples, 'asus_router_memory_total_bytes')).toBe(268435456);
        expect(valueOf(samples, 'asus_router_memory_used_bytes')).toBe(134217728);
        expect(valueOf(samples, 'asus_router_memory_free_bytes')).toBe(134217728);
        expect(valueOf(samples, 'asus_router_memory_used_percent')).toBe(50);

        expect(valueOf(samples, 'asus_router_netdev_bridge_transmit_bytes_total')).toBe(16);
        expect(valueOf(samples, 'asus_router_netdev_bridge_receive_bytes_total')).toBe(32);
        expect(find(samples, 'asus_router_netdev_wired_transmit_bytes_total')).toBeUndefined();
        expect(valueOf(samples, 'asus_router_netdev_internet_transmit_bytes_total', { interface_id: '0' })).toBe(255);
        expect(valueOf(samples, 'asus_router_netdev_internet_receive_bytes_total', { interface_id: '0' })).toBe(256);
        expect(valueOf(samples, 'asus_router_netdev_wireless_transmit_bytes_total', { interface_id: '0' })).toBe(1);
        expect(find(samples, 'asus_router_netdev_wireless_receive_bytes_total', { interface_id: '0' })).toBeUndefined();
        expect(valueOf(samples, 'asus_router_netdev_wireless_receive_bytes_total', { interface_id: '1' })).toBe(2);
        expect(find(samples, 'asus_router_netdev_bridge_transmit_bytes_total')?.kind).toBe('counter');

        expect(valueOf(samples, 'asus_router_wireless_bands', { band: '2g' })).toBe(1);
        expect(valueOf(samples, 'asus_router_wireless_bands', { band: '5g' })).toBe(2);
        expect(valueOf(samples, 'asus_router_wireless_bands', { band: '6g' })).toBe(0);
        expect(valueOf(samples, 'asus_router_wireless_bands', { band: '60g' })).toBe(0);

        expect(valueOf(samples, 'asus_router_usb_devices', { type: 'storage' })).toBe(2);
        expect(valueOf(samples, 'asus_router_usb_devices', { type: 'modem' })).toBe(0);
        expect(valueOf(samples, 'asus_router_usb_devices', { type: 'printer' })).toBe(1);

        expect(valueOf(samples, 'asus_router_dualwan_enabled')).toBe(1);
        expect(valueOf(samples, 'asus_router_wan_enabled', { unit: '0' })).toBe(1);
        expect(valueOf(samples, 'asus_router_wan_enabled', { unit: '1' })).toBe(0);
        expect(valueOf(samples, 'asus_router_wan_active', { unit: '0' })).toBe(1);
        expect(valueOf(samples, 'asus_router_wan_active', { unit: '1' })).toBe(0);
        expect(valueOf(samples, 'asus_router_dualwan_mode', { unit: '0', mode: 'wan' })).toBe(1);
        expect(valueOf(samples, 'asus_router_dualwan_mode', { unit: '1', mode: 'usb' })).toBe(1);
        expect(valueOf(samples, 'asus_router_dualwan_mode', { unit: '1', mode: 'wan' })).toBe(0);

        for (const sample of samples) {
            expect(sample.labels.product_id).toBe('RT-AX88U');
        }
    });

    it('reports dual WAN disabled when a unit is none', () => {
        const samples = MetricExtractor.extract(report({
            info: INFO,
            dualwan: { wans_dualwan: 'wan none', get_ui_support: { dualwan: 1 } }
        }));

        expect(valueOf(samples, 'asus_router_dualwan_enabled')).toBe(0);
        expect(find(samples, 'asus_router_wan_active')).toBeUndefined();
    });

    describe('cpu', () => {
        const current = { cpu_usage: { cpu1_total: '2000', cpu1_usage: '500', cpu2_total: '2000', cpu2_usage: '1000' } };
        const previous = { cpu_usage: { cpu1_total: '1000', cpu1_usage: '250', cpu2_total: '1000', cpu2_usage: '1000' } };

        it('exports the cumulative tick counters per cpu', () => {
            const samples = MetricExtractor.extract(report({ info: INFO, cpu: current }));

            expect(valueOf(samples, 'asus_router_cpu_usage_total', { cpu_id: '0' })).toBe(500);
            expect(valueOf(samples, 'asus_router_cpu_total', { cpu_id: '1' })).toBe(2000);
            expect(valueOf(samples, 'asus_router_cpu_usage_total', { cpu_id: '1' })).toBe(1000);
            expect(find(samples, 'asus_router_cpu_usage_percent')).toBeUndefined();
        });

        it('derives the usage percent from the previous report', () => {
            const samples = MetricExtractor.extract(
                report({ info: INFO, cpu: current }),
                report({ info: INFO, cpu: previous })
            );

            expect(valueOf(samples, 'asus_router_cpu_usage_percent', { cpu_id: '0' })).toBe(25);
            expect(valueOf(samples, 'asus_router_cpu_usage_percent', { cpu_id: '1' })).toBe(0);
        });

        it('skips the percent after a counter reset', () => {
            const samples = MetricExtractor.extract(
                report({ info: INFO, cpu: previous }),
                report({ info: INFO, cpu: current })
            );

            expect(find(samples, 'asus_router_cpu_usage_percent')).toBeUndefined();
        });
    });

    it('skips malformed optional fields', () => {
        const samples = MetricExtractor.extract(report({
            info: { ...INFO, sw_mode: 'x' },
            temperature: { curr_cpuTemp: 'n/a' },
            memory: { memory_usage: { mem_total: '0', mem_used: 'abc' } }
        }));

        expect(find(samples, 'asus_router_sw_mode')).toBeUndefined();
        expect(find(samples, 'asus_router_cpu_temperature_celsius')).toBeUndefined();
        expect(valueOf(samples, 'asus_router_memory_total_bytes')).toBe(0);
        expect(find(samples, 'asus_router_memory_used_bytes')).toBeUndefined();
        expect(find(samples, 'asus_router_memory_used_percent')).toBeUndefined();
    });

    it('flags sections that failed in the cycle', () => {
        const samples = MetricExtractor.extract(report({ info: INFO }, { uptime: 'Malformed JSON' }));

        expect(valueOf(samples, 'asus_router_probe_section_success', { section: 'info' })).toBe(1);
        expect(valueOf(samples, 'asus_router_probe_section_success', { section: 'uptime' })).toBe(0);
        expect(find(samples, 'asus_router_probe_section_success', { section: 'cpu' })).toBeUndefined();
    });
});
