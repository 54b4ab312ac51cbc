import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { HttpTransport } from '../HttpTransport';
import { AuthError, DeviceError, TransportError } from '../ExporterError';
import { hook, nvram, page } from '../../client/Endpoints';

const ROUTER = 'http://192.168.50.1';
const OPTIONS = { timeoutMs: 1000 };

describe('HttpTransport', () => {
    let agent: MockAgent;
    let transport: HttpTransport;

    beforeEach(() => {
        agent = new MockAgent();
        agent.disableNetConnect();
        transport = new HttpTransport({ baseUrl: '192.168.50.1', dispatcher: agent, clock: () => 1_000 });
    });

    afterEach(async () => {
        await transport.close();
        await agent.close();
    });

    describe('login', () => {
        it('returns the token from the JSON body', async () => {
            agent.get(ROUTER).intercept({ path: '/login.cgi', method: 'POST' }).reply(200, { asus_token: 'body-token' });

            await expect(transport.login('dGVzdA==', OPTIONS)).resolves.toBe('body-token');
        });

        it('falls back to the Set-Cookie header', async () => {
            agent.get(ROUTER).intercept({ path: '/login.cgi', method: 'POST' })
                .reply(200, '', { headers: { 'set-cookie': 'asus_token=cookie-token; HttpOnly' } });

            await expect(transport.login('dGVzdA==', OPTIONS)).resolves.toBe('cookie-token');
        });

        it('raises AuthError on error_status', async () => {
            agent.get(ROUTER).intercept({ path: '/login.cgi', method: 'POST' }).reply(200, { error_status: '3' });

            const error = await transport.login('dGVzdA==', OPTIONS).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(AuthError);
            expect(error instanceof AuthError && error.isLockedOut).toBe(true);
        });

        it('raises AuthError when no token is issued', async () => {
            agent.get(ROUTER).intercept({ path: '/login.cgi', method: 'POST' }).reply(200, {});

            await expect(transport.login('dGVzdA==', OPTIONS)).rejects.toThrow('Login response carried no asus_token (login)');
        });
    });

    describe('request', () => {
        it('decodes a hook response', async () => {
            agent.get(ROUTER).intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' })
                .reply(200, { uptime: 'Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)' });

            const response = await transport.request(hook('uptime'), 'token', OPTIONS);

            expect(response).toEqual({
                endpoint: 'hook:uptime()',
                receivedAt: 1_000,
                payload: { uptime: 'Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)' }
            });
        });

        it('decodes an nvram response', async () => {
            agent.get(ROUTER).intercept({ path: '/appGet.cgi?hook=nvram_get%28productid%29', method: 'GET' })
                .reply(200, { productid: 'RT-AX88U' });

            const response = await transport.request(nvram('productid'), 'token', OPTIONS);
            expect(response.payload).toEqual({ productid: 'RT-AX88U' });
        });

        it('decodes an assignment page', async () => {
            agent.get(ROUTER).intercept({ path: '/ajax_coretmp.asp', method: 'GET' }).reply(200, 'curr_cpuTemp = "58";');

            const response = await transport.request(page('/ajax_coretmp.asp'), 'token', OPTIONS);
            expect(response.payload).toEqual({ curr_cpuTemp: '58' });
        });

        it('maps HTTP statuses to the error taxonomy', async () => {
            const pool = agent.get(ROUTER);
            pool.intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' }).reply(401, '');
            pool.intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' }).reply(503, '');
            pool.intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' }).reply(404, 'not here');

            await expect(transport.request(hook('uptime'), 'token', OPTIONS)).rejects.toBeInstanceOf(AuthError);
            await expect(transport.request(hook('uptime'), 'token', OPTIONS)).rejects.toBeInstanceOf(TransportError);
            await expect(transport.request(hook('uptime'), 'token', OPTIONS)).rejects.toBeInstanceOf(DeviceError);
        });

        it('raises AuthError when the session expired behind a 200', async () => {
            agent.get(ROUTER).intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' }).reply(200, { error_status: 2 });

            await expect(transport.request(hook('uptime'), 'token', OPTIONS)).rejects.toBeInstanceOf(AuthError);
        });

        it('raises a timeout TransportError when the router is too slow', async () => {
            agent.get(ROUTER).intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' })
                .reply(200, { uptime: 'x' }).delay(500);

            const error = await transport.request(hook('uptime'), 'token', { timeoutMs: 20 }).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(TransportError);
            expect(error instanceof TransportError && error.isTimeout).toBe(true);
        });

        it('raises TransportError when the connection fails', async () => {
            await expect(transport.request(hook('cpu_usage'), 'token', OPTIONS)).rejects.toBeInstanceOf(TransportError);
        });

        it('honours the caller abort signal', async () => {
            agent.get(ROUTER).intercept({ path: '/appGet.cgi?hook=uptime%28%29', method: 'GET' })
                .reply(200, { uptime: 'x' }).delay(500);

            const controller = new AbortController();
            const pending = transport.request(hook('uptime'), 'token', { timeoutMs: 1000, signal: controller.signal });
            controller.abort();

            const error = await pending.catch((e: unknown) => e);
            expect(error instanceof TransportError && error.isAborted).toBe(true);
        });
    });

    it('exposes the normalized base URL', () => {
        expect(transport.url).toBe(ROUTER);
    });
});
