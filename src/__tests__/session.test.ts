import { describe, expect, it } from 'vitest';

import { NetworkError, SessionSetupError, StatusMismatchError } from '../errors.js';
import { buildRequest } from '../request.js';
import { createSession, send } from '../session.js';
import { fakeTransport } from './fakes.js';

const SITE = 'https://portal.example.test';

describe('createSession', () => {
    it('should start with an empty cookie jar and redirects disabled', async () => {
        const session = createSession(10_000, { transport: fakeTransport(() => ({ statusCode: 200 })) });

        expect(session.followRedirect).toBe(false);
        expect(session.timeoutMillis).toBe(10_000);
        expect(await session.cookieJar.getCookies(SITE)).toHaveLength(0);
    });

    it('should reject a timeout that is not a positive integer', () => {
        expect(() => createSession(0)).toThrow(SessionSetupError);
        expect(() => createSession(1.5)).toThrow(SessionSetupError);
    });
});

describe('send', () => {
    it('should pass the session settings to the transport', async () => {
        const transport = fakeTransport(() => ({ statusCode: 200 }));
        const controller = new AbortController();
        const session = createSession(2_500, { transport, signal: controller.signal });

        await send(session, buildRequest('GET', `${SITE}/a`, undefined, { Accept: '*/*' }), 200);

        expect(transport.requests).toHaveLength(1);
        expect(transport.requests[0]).toMatchObject({
            method: 'GET',
            url: `${SITE}/a`,
            headers: { Accept: '*/*' },
            timeoutMillis: 2_500,
            followRedirect: false,
            signal: controller.signal,
        });
    });

    it('should return the body and status on a match', async () => {
        const session = createSession(1_000, {
            transport: fakeTransport(() => ({ statusCode: 200, body: Buffer.from('hello') })),
        });

        const result = await send(session, buildRequest('GET', `${SITE}/a`), 200);

        expect(result).toEqual({ body: Buffer.from('hello'), statusCode: 200, url: `${SITE}/a` });
    });

    it('should carry cookies from a matching response into the next request', async () => {
        const transport = fakeTransport((request) =>
            request.url.endsWith('/login')
                ? { statusCode: 302, setCookies: ['X=1; Path=/', 'Y=2; Path=/'] }
                : { statusCode: 200 },
        );
        const session = createSession(1_000, { transport });

        await send(session, buildRequest('POST', `${SITE}/login`), 302);
        await send(session, buildRequest('GET', `${SITE}/other/page`), 200);

        expect(transport.requests[0].headers.Cookie).toBeUndefined();
        expect(transport.requests[1].headers.Cookie).toBe('X=1; Y=2');
        const stored = await session.cookieJar.getCookies(`${SITE}/anything`);
        expect(stored.map((c) => `${c.key}=${c.value}`)).toEqual(['X=1', 'Y=2']);
    });

    it('should store cookies under the final URL', async () => {
        const session = createSession(1_000, {
            transport: fakeTransport(() => ({
                statusCode: 200,
                url: 'https://other.example.test/landed',
                setCookies: ['Z=9; Path=/'],
            })),
        });

        await send(session, buildRequest('GET', `${SITE}/start`), 200);

        expect(await session.cookieJar.getCookieString('https://other.example.test/')).toBe('Z=9');
        expect(await session.cookieJar.getCookieString(`${SITE}/`)).toBe('');
    });

    it('should throw a status mismatch with the body and keep no cookies', async () => {
        const session = createSession(1_000, {
            transport: fakeTransport(() => ({
                statusCode: 200,
                body: Buffer.from('login form'),
                setCookies: ['X=1; Path=/'],
            })),
        });

        const error = await send(session, buildRequest('POST', `${SITE}/login`), 302).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StatusMismatchError);
        if (!(error instanceof StatusMismatchError)) return;
        expect(error.message).toBe(`status code mismatch. wanted 302 got 200 for ${SITE}/login`);
        expect(error.wanted).toBe(302);
        expect(error.got).toBe(200);
        expect(error.url).toBe(`${SITE}/login`);
        expect(error.body.toString()).toBe('login form');
        expect(await session.cookieJar.getCookieString(`${SITE}/`)).toBe('');
    });

    it('should wrap transport failures in a NetworkError', async () => {
        const session = createSession(1_000, {
            transport: async () => {
                throw new Error('socket hang up');
            },
        });

        await expect(send(session, buildRequest('GET', `${SITE}/a`), 200)).rejects.toThrow(
            new NetworkError("couldn't send http request. socket hang up"),
        );
    });
});
