/**
 * asus-router-exporter
 * ==========================================
 * Prometheus exporter for ASUS routers.
 *
 * A session-aware client polls the router web interface on a schedule,
 * the samples are published into an immutable snapshot cache, and scrapes
 * are served from that cache without ever touching the device.
 *
 * @packageDocumentation
 */

// ===============================================
// 1. ROUTER CLIENT
// ===============================================

/**
 * Session-aware client.
 * Logs in lazily, shares one in-flight login between callers and
 * re-logs in once when the router rejects the session.
 */
export { RouterClient } from './client/RouterClient';
export type { RouterClientOptions, FetchOptions, EndpointFetcher } from './client/RouterClient';

/**
 * Fetch stage of a refresh cycle: reads every section into one DeviceReport.
 */
export { RouterProbe, DEFAULT_SECTIONS, INFO_NVRAM_KEYS } from './client/RouterProbe';
export type { DeviceSource, SectionPlan } from './client/RouterProbe';

/**
 * Endpoint catalogue (`hook()`, `nvram()`, `page()`) and payload decoding.
 */
export * from './client/Endpoints';
export { ResponseParser } from './client/ResponseParser';

// ===============================================
// 2. REFRESH ENGINE
// ===============================================

export { MetricExtractor, resolveSwMode, parseUptime } from './features/MetricExtractor';
export { RefreshScheduler, RefreshState } from './features/RefreshScheduler';
export type { RefreshSchedulerOptions, ExtractFn } from './features/RefreshScheduler';
export { SnapshotCache } from './core/SnapshotCache';
export type { SnapshotCacheOptions } from './core/SnapshotCache';
export { ExponentialBackoff } from './core/Backoff';
export type { BackoffOptions } from './core/Backoff';

// ===============================================
// 3. EXPOSITION
// ===============================================

/**
 * Text exposition renderer and the express app serving `/metrics` and `/health`.
 */
export { PrometheusExporter, CONTENT_TYPE } from './features/PrometheusExporter';
export { createMetricsApp, listen, closeServer } from './features/MetricsServer';

// ===============================================
// 4. CORE CONFIGURATION & TYPES
// ===============================================

export { HttpTransport } from './core/HttpTransport';
export type { DeviceTransport, HttpTransportOptions, RequestOptions } from './core/HttpTransport';
export { Auth } from './core/Auth';
export type { RouterCredentials } from './core/Auth';
export { createSession, isSessionValid } from './core/Session';
export type { Session } from './core/Session';
export * from './core/ExporterError';
export * from './core/HttpConstants';
export { loadConfig, describeConfig, parseFlags, flagFor, ENV_NAMES } from './config/ExporterConfig';
export type { ExporterConfig } from './config/ExporterConfig';
export * from './types';

// ===============================================
// 5. UTILITIES
// ===============================================

export { Logger, setLogLevel, getLogLevel, LOG_LEVELS } from './utils/Logger';
export type { LogLevel } from './utils/Logger';
export * from './utils/Helpers';
