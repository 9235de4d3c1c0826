import { log } from 'apify';
import { CookieJar } from 'tough-cookie';

import { errorMessage, NetworkError, SessionSetupError, StatusMismatchError } from './errors.js';
import { setHeader } from './request.js';
import { gotTransport } from './transport.js';
import type { HttpTransport, OutboundRequest, ResponseResult, Session, TransportResponse } from './types.js';

const LOG_PREFIX = '[http]';

interface SessionOptions {
    transport?: HttpTransport;
    signal?: AbortSignal;
}

export const createSession = (timeoutMillis: number, options: SessionOptions = {}): Session => {
    if (!Number.isInteger(timeoutMillis) || timeoutMillis <= 0) {
        throw new SessionSetupError(`invalid timeout ${timeoutMillis}ms. must be a positive integer`);
    }

    let cookieJar: CookieJar;
    try {
        cookieJar = new CookieJar();
    } catch (error) {
        throw new SessionSetupError(`couldn't create cookie jar. ${errorMessage(error)}`, { cause: error });
    }

    return {
        cookieJar,
        timeoutMillis,
        followRedirect: false,
        transport: options.transport ?? gotTransport,
        signal: options.signal,
    };
};

/**
 * Sends `request` with the session's cookies. The body is read whatever the status;
 * on a mismatch it travels on the thrown {@link StatusMismatchError}. Cookies are only
 * stored when the status matches.
 */
export const send = async (
    session: Session,
    request: OutboundRequest,
    expectedStatus: number,
): Promise<ResponseResult> => {
    const headers = { ...request.headers };
    const cookie = await session.cookieJar.getCookieString(request.url);
    if (cookie) setHeader(headers, 'Cookie', cookie);

    let response: TransportResponse;
    try {
        response = await session.transport({
            method: request.method,
            url: request.url,
            payload: request.payload,
            headers,
            timeoutMillis: session.timeoutMillis,
            followRedirect: session.followRedirect,
            signal: session.signal,
        });
    } catch (error) {
        throw new NetworkError(`couldn't send http request. ${errorMessage(error)}`, { cause: error });
    }

    log.debug(`${LOG_PREFIX} ${request.method} ${response.url} -> ${response.statusCode}`);

    if (response.statusCode !== expectedStatus) {
        throw new StatusMismatchError(expectedStatus, response.statusCode, response.url, response.body);
    }

    for (const setCookie of response.setCookies) {
        await session.cookieJar.setCookie(setCookie, response.url, { ignoreError: true });
    }

    return { body: response.body, statusCode: response.statusCode, url: response.url };
};
