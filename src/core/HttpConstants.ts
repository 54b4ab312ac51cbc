/**
 * core/HttpConstants.ts
 *
 * Status codes and wire constants of the ASUS web management interface
 * (`login.cgi`, `appGet.cgi`, `*.asp` pages).
 */

export enum AsusHttpStatus {
    OK = 200,
    BAD_REQUEST = 400,
    UNAUTHORIZED = 401,
    FORBIDDEN = 403,
    NOT_FOUND = 404,
    TOO_MANY_REQUESTS = 429,
    INTERNAL_SERVER_ERROR = 500,
    BAD_GATEWAY = 502,
    SERVICE_UNAVAILABLE = 503,
    GATEWAY_TIMEOUT = 504
}

/**
 * Values of the `error_status` field the firmware puts in JSON bodies
 * when it rejects a login or a session.
 */
export enum AsusLoginStatus {
    /** Wrong credentials, or the session token expired. */
    TOKEN_EXPIRED = 2,
    /** Too many failed logins; the router locks the account for a while. */
    LOCKED_OUT = 3,
    /** The web UI demands a captcha before accepting another login. */
    CAPTCHA_REQUIRED = 10
}

export const AsusLoginMessages: Record<number, string> = {
    2: 'Invalid credentials or expired session token.',
    3: 'Login temporarily locked after repeated failures.',
    10: 'Captcha required by the router before the next login.'
};

export const AsusHttpMessages: Record<number, string> = {
    400: 'Bad Request: The router rejected the request parameters.',
    401: 'Unauthorized: Session missing or expired.',
    403: 'Forbidden: The account is not allowed to read this page.',
    404: 'Not Found: The page or hook does not exist on this firmware.',
    429: 'Too Many Requests: The web server is throttling clients.',
    500: 'Internal Server Error: The router web server failed.',
    502: 'Bad Gateway: An intermediate proxy failed.',
    503: 'Service Unavailable: The router is booting or overloaded.',
    504: 'Gateway Timeout: The router did not answer in time.'
};

/** User agent of the vendor mobile app; the firmware serves JSON hooks to it. */
export const ASUS_USER_AGENT = 'asusrouter-Android-DUTUtil-1.0.0.245';

/** Cookie carrying the session token issued by `login.cgi`. */
export const SESSION_COOKIE = 'asus_token';

/** Page the firmware redirects to when a session is no longer valid. */
export const LOGIN_PAGE_MARKER = 'Main_Login.asp';

/**
 * Helper to determine if an HTTP failure is worth retrying later.
 * These map to `TransportError`; everything else is a payload-level problem.
 */
export function isRetryableCode(status: number): boolean {
    return status >= 500 || status === AsusHttpStatus.TOO_MANY_REQUESTS;
}
