import { Buffer } from 'buffer';

export interface RouterCredentials {
    username: string;
    password: string;
}

/**
 * Auth.ts
 * * Credential handling for the ASUS web login.
 * * Builds the `login_authorization` value and masks secrets before they reach a log line.
 */
export class Auth {

    /**
     * Encodes credentials the way `login.cgi` expects them:
     * `base64("<username>:<password>")`.
     */
    public static encodeAuthorization(credentials: RouterCredentials): string {
        if (!credentials.username) {
            throw new Error('[Auth] Username must not be empty.');
        }
        return Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
    }

    /**
     * Splits a `user:password` string. The password may itself contain colons.
     * Returns null when there is no colon or the user part is empty.
     */
    public static parseAuthString(raw: string): RouterCredentials | null {
        const separator = raw.indexOf(':');
        if (separator <= 0) return null;
        return {
            username: raw.substring(0, separator),
            password: raw.substring(separator + 1)
        };
    }

    /**
     * Sanitizes sensitive strings for safe logging.
     * @example
     * Auth.mask('supersecret') // returns "s********t"
     * Auth.mask('123') // returns "***"
     */
    public static mask(value: string | undefined): string {
        if (!value) return '<empty>';
        if (value.length < 4) return '***';

        const visibleStart = value.substring(0, 1);
        const visibleEnd = value.substring(value.length - 1);
        const maskLength = Math.min(value.length - 2, 8); // Cap mask length for readability

        return `${visibleStart}${'*'.repeat(maskLength)}${visibleEnd}`;
    }
}
