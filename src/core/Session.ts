/**
 * Authenticated session against the router web interface.
 * Owned by a single RouterClient; never shared between clients.
 */
export interface Session {
    /** Value of the `asus_token` cookie. */
    readonly token: string;
    readonly issuedAt: number;
    readonly expiresAt: number;
}

export function createSession(token: string, issuedAt: number, ttlMs: number): Session {
    return Object.freeze({ token, issuedAt, expiresAt: issuedAt + ttlMs });
}

export function isSessionValid(session: Session | null, now: number): session is Session {
    return session !== null && now < session.expiresAt;
}
