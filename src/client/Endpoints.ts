/**
 * Endpoints.ts
 * Catalogue of the router web endpoints the exporter reads.
 *
 * - `hook`:  `GET /appGet.cgi?hook=<name>(<args>)` returning `{"<name>": ...}`
 * - `nvram`: `GET /appGet.cgi?hook=nvram_get(a);nvram_get(b)` returning `{"a": "...", "b": "..."}`
 * - `page`:  `GET /<page>.asp` returning JavaScript assignments (`key = "value";`)
 */

export interface HookEndpoint {
    readonly kind: 'hook';
    readonly name: string;
    readonly args?: string;
}

export interface NvramEndpoint {
    readonly kind: 'nvram';
    readonly keys: readonly string[];
}

export interface PageEndpoint {
    readonly kind: 'page';
    readonly path: string;
}

export type EndpointSpec = HookEndpoint | NvramEndpoint | PageEndpoint;

export const LOGIN_PATH = '/login.cgi';
export const APP_GET_PATH = '/appGet.cgi';

export function hook(name: string, args = ''): HookEndpoint {
    return { kind: 'hook', name, args };
}

export function nvram(...keys: string[]): NvramEndpoint {
    if (keys.length === 0) {
        throw new Error('nvram endpoint needs at least one key');
    }
    return { kind: 'nvram', keys };
}

export function page(path: string): PageEndpoint {
    return { kind: 'page', path: path.startsWith('/') ? path : `/${path}` };
}

/**
 * Builds the request path (with query string) of an endpoint.
 * @example buildPath(hook('netdev', 'appobj')) // "/appGet.cgi?hook=netdev%28appobj%29"
 */
export function buildPath(endpoint: EndpointSpec): string {
    switch (endpoint.kind) {
        case 'hook':
            return `${APP_GET_PATH}?${new URLSearchParams({ hook: `${endpoint.name}(${endpoint.args ?? ''})` })}`;
        case 'nvram': {
            const expression = endpoint.keys.map(key => `nvram_get(${key})`).join(';');
            return `${APP_GET_PATH}?${new URLSearchParams({ hook: expression })}`;
        }
        case 'page':
            return endpoint.path;
    }
}

/**
 * Short id used in logs and error context.
 */
export function describeEndpoint(endpoint: EndpointSpec): string {
    switch (endpoint.kind) {
        case 'hook':
            return `hook:${endpoint.name}(${endpoint.args ?? ''})`;
        case 'nvram':
            return `nvram:${endpoint.keys.join(',')}`;
        case 'page':
            return `page:${endpoint.path}`;
    }
}

/**
 * Prefixes `http://` when no scheme is given and drops trailing slashes.
 * @example normalizeBaseUrl('192.168.50.1/') // "http://192.168.50.1"
 */
export function normalizeBaseUrl(host: string): string {
    const trimmed = host.trim();
    const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
    return withScheme.replace(/\/+$/, '');
}
