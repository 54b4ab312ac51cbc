import express, { Express, NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { SnapshotCache } from '../core/SnapshotCache';
import { ExporterError } from '../core/ExporterError';
import { CONTENT_TYPE, PrometheusExporter } from './PrometheusExporter';
import { Logger } from '../utils/Logger';

const log = new Logger('MetricsServer');

const INDEX_PAGE = `<!DOCTYPE html>
<html>
<head><title>ASUS Router Exporter</title></head>
<body>
<h1>ASUS Router Exporter</h1>
<p><a href="/metrics">Metrics</a></p>
<p><a href="/health">Health</a></p>
</body>
</html>
`;

/**
 * Builds the HTTP surface of the exporter.
 * Every route reads the cache only; nothing here talks to the router.
 */
export function createMetricsApp(cache: SnapshotCache): Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/metrics', (_req: Request, res: Response) => {
        const snapshot = cache.read();
        const body = PrometheusExporter.render(snapshot, cache.health());
        // end() rather than send(): send() would reorder the content-type parameters
        res.status(200).set('Content-Type', CONTENT_TYPE).end(body);
    });

    app.get('/health', (_req: Request, res: Response) => {
        const health = cache.health();
        res.status(health.status === 'healthy' ? 200 : 503).json({
            status: health.status,
            // Infinity is not valid JSON
            ageSeconds: Number.isFinite(health.ageSeconds) ? health.ageSeconds : null,
            success: health.success,
            consecutiveFailures: health.consecutiveFailures,
            lastError: health.lastError
        });
    });

    app.get('/', (_req: Request, res: Response) => {
        res.type('html').send(INDEX_PAGE);
    });

    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        const error = ExporterError.wrap(err);
        log.error(`${req.method} ${req.originalUrl} failed: ${error.message}`, error.toJSON());
        res.status(500).json({ code: error.code, message: error.message });
    });

    return app;
}

/**
 * Starts listening and resolves once the port is bound.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = host ? app.listen(port, host) : app.listen(port);
        server.once('listening', () => {
            log.info(`Serving metrics on http://${host || '0.0.0.0'}:${port}/metrics`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

/**
 * Closes the listener and waits for open connections to finish.
 */
export function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
}
