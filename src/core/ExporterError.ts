/**
 * core/ExporterError.ts
 *
 * Error taxonomy for router interactions and the refresh pipeline.
 * Features:
 * - One subclass per failure family (auth, transport, device payload, extraction, config).
 * - Semantic getters (isRetryable, isTimeout, isCaptchaRequired...).
 * - Static factories for HTTP statuses and failed fetch calls.
 * - JSON serialization for structured logs.
 */
import { AsusHttpMessages, AsusHttpStatus, AsusLoginMessages, AsusLoginStatus, isRetryableCode } from './HttpConstants';
import { isRecord } from '../utils/Helpers';

export type ExporterErrorCode = 'AUTH' | 'TRANSPORT' | 'DEVICE' | 'EXTRACTION' | 'CONFIG' | 'INTERNAL';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

const EXCERPT_LENGTH = 120;

export class ExporterError extends Error {
    public readonly isExporterError = true;
    public readonly timestamp: Date;

    constructor(
        public readonly code: ExporterErrorCode,
        message: string,
        public readonly context: ErrorContext = {},
        options?: { cause?: unknown }
    ) {
        super(message, options);

        this.name = 'ExporterError';
        this.timestamp = new Date();

        // Fix for extending built-ins in TypeScript/ES6
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /** Recoverable by waiting and trying again (everything but configuration mistakes). */
    get isRetryable(): boolean {
        return this.code !== 'CONFIG';
    }

    /**
     * Classifies a non-2xx HTTP answer from the router.
     * 401/403 mean the session is gone, 5xx/429 mean the device is struggling,
     * anything else means it answered something we cannot use.
     */
    public static fromStatus(status: number, body: string, target: string): ExporterError {
        const prefix = AsusHttpMessages[status] || 'Unexpected HTTP status';
        const message = `Router [${status}] ${prefix} (${target})`;

        if (status === AsusHttpStatus.UNAUTHORIZED || status === AsusHttpStatus.FORBIDDEN) {
            return new AuthError(message, { target, status });
        }
        if (isRetryableCode(status)) {
            return new TransportError(message, { target, status });
        }
        return new DeviceError(message, { target, status, excerpt: DeviceError.excerpt(body) });
    }

    /**
     * Normalizes anything thrown inside the pipeline so it can be logged and stored.
     */
    public static wrap(error: unknown): ExporterError {
        if (error instanceof ExporterError) return error;
        const message = error instanceof Error ? error.message : String(error);
        return new ExporterError('INTERNAL', message, {}, { cause: error });
    }

    /**
     * Custom JSON representation for logging systems.
     */
    public toJSON() {
        return {
            errorType: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
            isRetryable: this.isRetryable,
            timestamp: this.timestamp
        };
    }
}

/**
 * The router refused the credentials or the session token.
 * Triggers exactly one re-login in the client.
 */
export class AuthError extends ExporterError {
    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super('AUTH', message, context, options);
        this.name = 'AuthError';
    }

    get loginStatus(): number | undefined {
        const status = this.context.loginStatus;
        return typeof status === 'number' ? status : undefined;
    }

    get isCaptchaRequired(): boolean {
        return this.loginStatus === AsusLoginStatus.CAPTCHA_REQUIRED;
    }

    get isLockedOut(): boolean {
        return this.loginStatus === AsusLoginStatus.LOCKED_OUT;
    }

    public static fromLoginStatus(loginStatus: number, target: string): AuthError {
        const detail = AsusLoginMessages[loginStatus] || 'Router rejected the session.';
        return new AuthError(`Router error_status=${loginStatus} (${target}) -> ${detail}`, { target, loginStatus });
    }
}

/**
 * The request never produced a usable HTTP exchange: refused, reset, timed out,
 * or the router answered with a server-side failure status.
 * Never triggers a re-login.
 */
export class TransportError extends ExporterError {
    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super('TRANSPORT', message, context, options);
        this.name = 'TransportError';
    }

    get isTimeout(): boolean {
        return this.context.errno === 'TIMEOUT';
    }

    get isAborted(): boolean {
        return this.context.errno === 'ABORTED';
    }

    /**
     * Converts a rejected `fetch()` into a TransportError.
     * undici reports network failures as `TypeError: fetch failed` with the
     * socket error (ECONNREFUSED, ECONNRESET...) in `cause`.
     */
    public static fromFetchFailure(error: unknown, target: string, timeoutMs: number): TransportError {
        if (error instanceof Error && error.name === 'TimeoutError') {
            return new TransportError(`Request timed out after ${timeoutMs}ms (${target})`, {
                target, errno: 'TIMEOUT', timeoutMs
            }, { cause: error });
        }

        if (error instanceof Error && error.name === 'AbortError') {
            return new TransportError(`Request aborted (${target})`, { target, errno: 'ABORTED' }, { cause: error });
        }

        const cause = error instanceof Error ? error.cause : undefined;
        const errno = isRecord(cause) && typeof cause.code === 'string' ? cause.code : 'UNKNOWN';
        const reason = cause instanceof Error ? cause.message : error instanceof Error ? error.message : String(error);

        return new TransportError(`Connection failed: ${reason} (Code: ${errno}) (${target})`, {
            target, errno
        }, { cause: error });
    }
}

/**
 * The router answered, but with a payload that is malformed or an error page.
 */
export class DeviceError extends ExporterError {
    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super('DEVICE', message, context, options);
        this.name = 'DeviceError';
    }

    /** Shortens a response body for logs, collapsing whitespace. */
    public static excerpt(body: string): string {
        const flat = body.replace(/\s+/g, ' ').trim();
        return flat.length > EXCERPT_LENGTH ? `${flat.slice(0, EXCERPT_LENGTH)}...` : flat;
    }
}

/**
 * A decoded payload lacks the minimum shape needed to build metrics.
 */
export class ExtractionError extends ExporterError {
    constructor(message: string, context: ErrorContext = {}) {
        super('EXTRACTION', message, context);
        this.name = 'ExtractionError';
    }
}

/**
 * Invalid startup configuration. Fatal.
 */
export class ConfigError extends ExporterError {
    public readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super('CONFIG', `Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`, {
            issueCount: issues.length
        });
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
