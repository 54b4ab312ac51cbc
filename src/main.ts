#!/usr/bin/env node
import { Server } from 'http';
import { loadConfig, describeConfig, ExporterConfig } from './config/ExporterConfig';
import { ConfigError, ExporterError } from './core/ExporterError';
import { HttpTransport } from './core/HttpTransport';
import { SnapshotCache } from './core/SnapshotCache';
import { RouterClient } from './client/RouterClient';
import { RouterProbe } from './client/RouterProbe';
import { RefreshScheduler } from './features/RefreshScheduler';
import { closeServer, createMetricsApp, listen } from './features/MetricsServer';
import { Logger, setLogLevel } from './utils/Logger';

const log = new Logger('Main');

interface Runtime {
    config: ExporterConfig;
    client: RouterClient;
    scheduler: RefreshScheduler;
    server: Server;
}

async function start(config: ExporterConfig): Promise<Runtime> {
    setLogLevel(config.logLevel);
    log.info('Configuration loaded', describeConfig(config));

    const client = new RouterClient({
        transport: new HttpTransport({ baseUrl: config.routerHost }),
        credentials: config.credentials,
        sessionTtlMs: config.sessionTtlMs,
        requestTimeoutMs: config.requestTimeoutMs
    });

    const cache = new SnapshotCache({
        stalenessCeilingMs: config.stalenessCeilingMs,
        failureThreshold: config.failureThreshold
    });

    const scheduler = new RefreshScheduler(new RouterProbe(client), cache, {
        refreshIntervalMs: config.refreshIntervalMs,
        backoff: { baseMs: config.backoffBaseMs, ceilingMs: config.backoffCeilingMs },
        failureThreshold: config.failureThreshold
    });

    const server = await listen(createMetricsApp(cache), config.metricsPort);
    scheduler.start();

    return { config, client, scheduler, server };
}

async function shutdown(runtime: Runtime, signal: string): Promise<void> {
    log.info(`${signal} received, shutting down`);
    await runtime.scheduler.stop(runtime.config.shutdownGraceMs);
    await closeServer(runtime.server);
    await runtime.client.close();
    log.info('Bye');
}

async function main(): Promise<void> {
    let config: ExporterConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            log.error(error.message);
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    const runtime = await start(config);

    let stopping = false;
    const onSignal = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        shutdown(runtime, signal).catch((error: unknown) => {
            log.error(`Shutdown failed: ${ExporterError.wrap(error).message}`);
            process.exitCode = 1;
        });
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
    const wrapped = ExporterError.wrap(error);
    log.error(`Fatal: ${wrapped.message}`, wrapped.toJSON());
    process.exit(1);
});
