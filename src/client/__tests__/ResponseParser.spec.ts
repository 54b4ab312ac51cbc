import { describe, it, expect } from 'vitest';
import { ResponseParser } from '../ResponseParser';
import { hook, page } from '../Endpoints';
import { AuthError, DeviceError } from '../../core/ExporterError';

describe('ResponseParser', () => {
    describe('decode', () => {
        it('decodes JSON hook payloads', () => {
            const payload = ResponseParser.decode(hook('uptime'), '{"uptime":"Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)"}');
            expect(payload).toEqual({ uptime: 'Thu, 02 Jan 2025 10:00:00 +0000(3600 secs since boot)' });
        });

        it('tolerates trailing commas', () => {
            const payload = ResponseParser.decode(hook('memory_usage'), '{"memory_usage":{"mem_total":"262144","mem_free":"131072",},}');
            expect(payload).toEqual({ memory_usage: { mem_total: '262144', mem_free: '131072' } });
        });

        it('raises DeviceError for malformed bodies', () => {
            expect(() => ResponseParser.decode(hook('uptime'), '<html>oops</html>')).toThrow(DeviceError);
            expect(() => ResponseParser.decode(hook('uptime'), '[1,2]')).toThrow('Expected a JSON object from router (hook:uptime())');
        });

        it('raises AuthError when the body carries error_status', () => {
            let caught: unknown;
            try {
                ResponseParser.decode(hook('uptime'), '{"error_status":"2"}');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(AuthError);
            expect(caught instanceof AuthError && caught.loginStatus).toBe(2);
        });

        it('raises AuthError when redirected to the login page', () => {
            expect(() => ResponseParser.decode(hook('uptime'), '<script>top.location.href="/Main_Login.asp";</script>'))
                .toThrow('Router redirected to the login page (hook:uptime())');
        });

        it('decodes assignment pages', () => {
            const body = 'curr_coreTmp_2_raw = "45 C";\ncurr_cpuTemp = "61.2";\n';
            expect(ResponseParser.decode(page('/ajax_coretmp.asp'), body)).toEqual({
                curr_coreTmp_2_raw: '45 C',
                curr_cpuTemp: '61.2'
            });
        });

        it('raises DeviceError for a page without assignments', () => {
            expect(() => ResponseParser.decode(page('/ajax_coretmp.asp'), 'nothing here')).toThrow(DeviceError);
        });
    });

    describe('extractToken', () => {
        it('prefers the JSON body', () => {
            expect(ResponseParser.extractToken('{"asus_token":"body-token"}', ['asus_token=cookie-token'], 'asus_token')).toBe('body-token');
        });

        it('falls back to the Set-Cookie header', () => {
            const cookies = ['clickedItem_tab=0; path=/', 'asus_token=cookie-token; HttpOnly;'];
            expect(ResponseParser.extractToken('', cookies, 'asus_token')).toBe('cookie-token');
        });

        it('returns null when neither carries a token', () => {
            expect(ResponseParser.extractToken('{}', ['other=1'], 'asus_token')).toBeNull();
        });
    });
});
