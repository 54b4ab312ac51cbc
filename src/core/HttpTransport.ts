import { Agent, Dispatcher, fetch } from 'undici';
import type { RequestInit, Response } from 'undici';
import { AuthError, ExporterError, TransportError } from './ExporterError';
import { ASUS_USER_AGENT, SESSION_COOKIE } from './HttpConstants';
import { buildPath, describeEndpoint, EndpointSpec, LOGIN_PATH, normalizeBaseUrl } from '../client/Endpoints';
import { ResponseParser } from '../client/ResponseParser';
import type { RawDeviceResponse } from '../types';

export interface RequestOptions {
    /** Upper bound for one round trip, in ms. */
    timeoutMs: number;
    /** Caller cancellation (e.g. scheduler shutdown). */
    signal?: AbortSignal;
}

/**
 * The wire-level operations a RouterClient needs.
 * HttpTransport is the production implementation; tests substitute fakes.
 */
export interface DeviceTransport {
    /** Performs the login handshake and returns the session token. */
    login(authorization: string, options: RequestOptions): Promise<string>;
    /** Reads one endpoint with an existing session token. */
    request(endpoint: EndpointSpec, token: string, options: RequestOptions): Promise<RawDeviceResponse>;
    close(): Promise<void>;
}

export interface HttpTransportOptions {
    /** Router address, with or without scheme (e.g. `192.168.50.1`, `https://router.asus.com:8443`) */
    baseUrl: string;
    /** Accept self-signed certificates when using https (Default: true, as shipped by the firmware) */
    insecure?: boolean;
    /** Custom undici dispatcher. The transport only destroys dispatchers it created itself. */
    dispatcher?: Dispatcher;
    userAgent?: string;
    clock?: () => number;
}

/**
 * HttpTransport
 * * HTTP driver for the ASUS web management interface, built on undici.
 * * Every call is bounded by `AbortSignal.timeout()` and translated into the
 * * exporter error taxonomy (AuthError / TransportError / DeviceError).
 */
export class HttpTransport implements DeviceTransport {
    private readonly baseUrl: string;
    private readonly dispatcher: Dispatcher;
    private readonly ownsDispatcher: boolean;
    private readonly userAgent: string;
    private readonly clock: () => number;

    constructor(options: HttpTransportOptions) {
        this.baseUrl = normalizeBaseUrl(options.baseUrl);
        this.userAgent = options.userAgent || ASUS_USER_AGENT;
        this.clock = options.clock || Date.now;

        if (options.dispatcher) {
            this.dispatcher = options.dispatcher;
            this.ownsDispatcher = false;
        } else {
            this.dispatcher = new Agent({
                connect: {
                    rejectUnauthorized: !(options.insecure ?? true)
                }
            });
            this.ownsDispatcher = true;
        }
    }

    public get url(): string {
        return this.baseUrl;
    }

    /**
     * `POST /login.cgi` with `login_authorization=<base64(user:password)>`.
     * @returns The `asus_token` issued by the router.
     */
    public async login(authorization: string, options: RequestOptions): Promise<string> {
        const target = 'login';
        const response = await this.send(LOGIN_PATH, {
            method: 'POST',
            headers: {
                'User-Agent': this.userAgent,
                'Content-Type': 'application/x-www-form-urlencoded'
            },
            body: `login_authorization=${authorization}`
        }, options, target);

        const body = await this.readBody(response, target, options);

        if (!response.ok) {
            throw ExporterError.fromStatus(response.status, body, target);
        }

        if (body.includes('error_status')) {
            ResponseParser.assertSessionAccepted(ResponseParser.parseJsonObject(body, target), target);
        }

        const token = ResponseParser.extractToken(body, response.headers.getSetCookie(), SESSION_COOKIE);
        if (!token) {
            throw new AuthError(`Login response carried no ${SESSION_COOKIE} (${target})`, { target, status: response.status });
        }
        return token;
    }

    /**
     * `GET` one endpoint with the session cookie and decode its body.
     */
    public async request(endpoint: EndpointSpec, token: string, options: RequestOptions): Promise<RawDeviceResponse> {
        const target = describeEndpoint(endpoint);
        const response = await this.send(buildPath(endpoint), {
            method: 'GET',
            headers: {
                'User-Agent': this.userAgent,
                'Cookie': `${SESSION_COOKIE}=${token}`
            }
        }, options, target);

        const body = await this.readBody(response, target, options);

        if (!response.ok) {
            throw ExporterError.fromStatus(response.status, body, target);
        }

        return {
            endpoint: target,
            receivedAt: this.clock(),
            payload: ResponseParser.decode(endpoint, body)
        };
    }

    public async close(): Promise<void> {
        if (this.ownsDispatcher) {
            await this.dispatcher.destroy();
        }
    }

    private async send(path: string, init: RequestInit, options: RequestOptions, target: string): Promise<Response> {
        const timeout = AbortSignal.timeout(options.timeoutMs);
        const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

        try {
            return await fetch(`${this.baseUrl}${path}`, {
                ...init,
                dispatcher: this.dispatcher,
                signal
            });
        } catch (error) {
            throw TransportError.fromFetchFailure(error, target, options.timeoutMs);
        }
    }

    private async readBody(response: Response, target: string, options: RequestOptions): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            throw TransportError.fromFetchFailure(error, target, options.timeoutMs);
        }
    }
}
