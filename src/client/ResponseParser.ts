import { AuthError, DeviceError } from '../core/ExporterError';
import { LOGIN_PAGE_MARKER } from '../core/HttpConstants';
import { isRecord } from '../utils/Helpers';
import { describeEndpoint, EndpointSpec } from './Endpoints';
import type { DevicePayload } from '../types';

/**
 * ResponseParser.ts
 * Turns raw router response bodies into plain objects.
 * Features:
 * - Lenient JSON decoding (the firmware sometimes leaves trailing commas).
 * - Detection of session errors hidden in 200 responses (`error_status`, login redirects).
 * - Decoding of `.asp` pages made of `key = "value";` assignments.
 */
export class ResponseParser {

    /**
     * Decodes the body returned for an endpoint.
     * @throws AuthError when the body says the session is not valid.
     * @throws DeviceError when the body cannot be decoded.
     */
    public static decode(endpoint: EndpointSpec, body: string): DevicePayload {
        const target = describeEndpoint(endpoint);

        if (body.includes(LOGIN_PAGE_MARKER)) {
            throw new AuthError(`Router redirected to the login page (${target})`, { target });
        }

        if (endpoint.kind === 'page') {
            const assignments = ResponseParser.parseAssignments(body);
            if (Object.keys(assignments).length === 0) {
                throw new DeviceError(`No values found in page (${target})`, {
                    target, excerpt: DeviceError.excerpt(body)
                });
            }
            return assignments;
        }

        const payload = ResponseParser.parseJsonObject(body, target);
        ResponseParser.assertSessionAccepted(payload, target);
        return payload;
    }

    /**
     * Parses a JSON object body, tolerating trailing commas.
     * @throws DeviceError when the body is not a JSON object.
     */
    public static parseJsonObject(body: string, target: string): Record<string, unknown> {
        const text = body.trim();
        let parsed: unknown;

        try {
            parsed = JSON.parse(text);
        } catch {
            try {
                // `{"a":"1",}` is common on older firmware
                parsed = JSON.parse(text.replace(/,\s*([}\]])/g, '$1'));
            } catch (error) {
                throw new DeviceError(`Malformed JSON from router (${target})`, {
                    target, excerpt: DeviceError.excerpt(body)
                }, { cause: error });
            }
        }

        if (!isRecord(parsed)) {
            throw new DeviceError(`Expected a JSON object from router (${target})`, {
                target, excerpt: DeviceError.excerpt(body)
            });
        }
        return parsed;
    }

    /**
     * Throws when the router answered with an `error_status` field.
     */
    public static assertSessionAccepted(payload: Record<string, unknown>, target: string): void {
        if (!('error_status' in payload)) return;

        const raw = payload.error_status;
        const status = typeof raw === 'number' ? raw : Number(raw);
        throw AuthError.fromLoginStatus(Number.isFinite(status) ? status : -1, target);
    }

    /**
     * Extracts `name = value;` pairs, stripping surrounding quotes.
     * @example parseAssignments('curr_cpuTemp = "61.2";') // { curr_cpuTemp: '61.2' }
     */
    public static parseAssignments(body: string): Record<string, string> {
        const pattern = /(\w+)\s*=\s*("?[^";]+"?);/g;
        const result: Record<string, string> = {};

        for (const match of body.matchAll(pattern)) {
            result[match[1]] = match[2].replace(/^"|"$/g, '').trim();
        }
        return result;
    }

    /**
     * Extracts the session token from a login response.
     * The firmware returns it in the JSON body and as a cookie; either is enough.
     */
    public static extractToken(body: string, setCookies: readonly string[], cookieName: string): string | null {
        try {
            const parsed: unknown = JSON.parse(body);
            const token = isRecord(parsed) ? parsed[cookieName] : undefined;
            if (typeof token === 'string' && token !== '') {
                return token;
            }
        } catch {
            // Not JSON: fall back to the cookie header
        }

        for (const cookie of setCookies) {
            const [pair] = cookie.split(';');
            const separator = pair.indexOf('=');
            if (separator <= 0) continue;

            const name = pair.substring(0, separator).trim();
            const value = pair.substring(separator + 1).trim();
            if (name === cookieName && value !== '') return value;
        }
        return null;
    }
}
