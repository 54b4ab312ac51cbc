import { describe, it, expect } from 'vitest';
import { Auth } from '../Auth';
import { createSession, isSessionValid } from '../Session';

describe('Auth', () => {
    it('encodes the login authorization as base64 of user:password', () => {
        expect(Auth.encodeAuthorization({ username: 'admin', password: 'test-secret' }))
            .toBe(Buffer.from('admin:test-secret').toString('base64'));
        expect(Auth.encodeAuthorization({ username: 'a', password: 'b' })).toBe('YTpi');
    });

    it('parses user:password strings', () => {
        expect(Auth.parseAuthString('admin:test-secret')).toEqual({ username: 'admin', password: 'test-secret' });
        expect(Auth.parseAuthString('admin:')).toEqual({ username: 'admin', password: '' });
        expect(Auth.parseAuthString('admin')).toBeNull();
        expect(Auth.parseAuthString(':secret')).toBeNull();
    });

    it('masks secrets for logging', () => {
        expect(Auth.mask('supersecret')).toBe('s********t');
        expect(Auth.mask('123')).toBe('***');
        expect(Auth.mask('')).toBe('<empty>');
    });
});

describe('Session', () => {
    it('is valid strictly before its expiry', () => {
        const session = createSession('token', 1_000, 500);

        expect(session.expiresAt).toBe(1_500);
        expect(isSessionValid(session, 1_499)).toBe(true);
        expect(isSessionValid(session, 1_500)).toBe(false);
        expect(isSessionValid(null, 0)).toBe(false);
        expect(Object.isFrozen(session)).toBe(true);
    });
});
