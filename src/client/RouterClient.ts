import { Auth, RouterCredentials } from '../core/Auth';
import { AuthError } from '../core/ExporterError';
import { DeviceTransport, RequestOptions } from '../core/HttpTransport';
import { createSession, isSessionValid, Session } from '../core/Session';
import { Logger } from '../utils/Logger';
import { describeEndpoint, EndpointSpec } from './Endpoints';
import type { RawDeviceResponse } from '../types';

export interface RouterClientOptions {
    /** Wire driver (usually an `HttpTransport`). */
    transport: DeviceTransport;
    credentials: RouterCredentials;
    /**
     * Lifetime of a session before it is renewed proactively, in ms.
     * Default: 600000 (10 minutes)
     */
    sessionTtlMs?: number;
    /**
     * Default upper bound for one device round trip, in ms.
     * Default: 10000
     */
    requestTimeoutMs?: number;
    clock?: () => number;
}

export interface FetchOptions {
    /** Overrides `requestTimeoutMs` for this call. */
    timeoutMs?: number;
    signal?: AbortSignal;
}

/**
 * Anything able to read an endpoint. RouterClient is the production implementation.
 */
export interface EndpointFetcher {
    fetch(endpoint: EndpointSpec, options?: FetchOptions): Promise<RawDeviceResponse>;
}

/**
 * RouterClient
 * * Session-aware facade over the router web interface.
 *
 * **Session lifecycle:**
 * 1. **Lazy login:** No session exists until the first `fetch()`. Expired sessions
 *    (older than `sessionTtlMs`) are renewed before use.
 * 2. **Single-flight login:** Concurrent callers that need a session share one
 *    in-flight login instead of each starting their own.
 * 3. **Auth recovery:** A fetch rejected with `AuthError` invalidates the session,
 *    logs in again and retries exactly once. A second `AuthError` propagates.
 * 4. **Transport failures** (`TransportError`) propagate untouched; the session
 *    is kept since the router never rejected it.
 *
 * @example
 * const client = new RouterClient({
 *     transport: new HttpTransport({ baseUrl: '192.168.50.1' }),
 *     credentials: { username: 'admin', password: 'change-me' },
 *     requestTimeoutMs: 5000
 * });
 * const uptime = await client.fetch(hook('uptime'));
 */
export class RouterClient implements EndpointFetcher {
    private readonly transport: DeviceTransport;
    private readonly authorization: string;
    private readonly sessionTtlMs: number;
    private readonly requestTimeoutMs: number;
    private readonly clock: () => number;
    private readonly log = new Logger('RouterClient');

    private session: Session | null = null;
    private loginInFlight: Promise<Session> | null = null;
    private loginCount = 0;

    constructor(options: RouterClientOptions) {
        this.transport = options.transport;
        this.authorization = Auth.encodeAuthorization(options.credentials);
        this.sessionTtlMs = options.sessionTtlMs ?? 600_000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
        this.clock = options.clock || Date.now;
    }

    /** True while a non-expired session is held. */
    public get hasSession(): boolean {
        return isSessionValid(this.session, this.clock());
    }

    /** Number of login handshakes performed since construction. */
    public get logins(): number {
        return this.loginCount;
    }

    /**
     * Reads one endpoint, logging in first when needed.
     *
     * @throws AuthError when the router still rejects the session after one re-login.
     * @throws TransportError when the router is unreachable or times out.
     * @throws DeviceError when the router answered with an unusable payload.
     */
    public async fetch(endpoint: EndpointSpec, options: FetchOptions = {}): Promise<RawDeviceResponse> {
        const requestOptions: RequestOptions = {
            timeoutMs: options.timeoutMs ?? this.requestTimeoutMs,
            signal: options.signal
        };

        const session = await this.ensureSession(requestOptions);

        try {
            return await this.transport.request(endpoint, session.token, requestOptions);
        } catch (error) {
            if (!(error instanceof AuthError)) throw error;

            this.log.info(`Session rejected on ${describeEndpoint(endpoint)}, logging in again`);
            this.invalidate(session);

            const renewed = await this.ensureSession(requestOptions);
            return this.transport.request(endpoint, renewed.token, requestOptions);
        }
    }

    /**
     * Forgets the current session. The next fetch logs in again.
     */
    public logout(): void {
        this.session = null;
    }

    public async close(): Promise<void> {
        this.session = null;
        await this.transport.close();
    }

    /**
     * Returns the current session, or joins/starts the single in-flight login.
     */
    private ensureSession(options: RequestOptions): Promise<Session> {
        if (isSessionValid(this.session, this.clock())) {
            return Promise.resolve(this.session);
        }

        if (!this.loginInFlight) {
            // The caller's signal is not forwarded: other callers may be waiting on this login.
            this.loginInFlight = this.login({ timeoutMs: options.timeoutMs }).finally(() => {
                this.loginInFlight = null;
            });
        }
        return this.loginInFlight;
    }

    private async login(options: RequestOptions): Promise<Session> {
        this.loginCount++;
        this.log.debug(`Login attempt #${this.loginCount}`);

        const token = await this.transport.login(this.authorization, options);
        const session = createSession(token, this.clock(), this.sessionTtlMs);
        this.session = session;

        this.log.debug(`Session established, token ${Auth.mask(token)}`);
        return session;
    }

    /**
     * Drops `stale` only if it is still the current session, so a session
     * renewed meanwhile by another caller survives.
     */
    private invalidate(stale: Session): void {
        if (this.session === stale) {
            this.session = null;
        }
    }
}
