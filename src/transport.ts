import { gotScraping } from 'crawlee';

import type { HttpTransport } from './types.js';

/**
 * Default transport. Redirects are returned rather than followed, HTTP errors are
 * returned rather than thrown, and the header generator is off so only the caller's
 * headers go out.
 */
export const gotTransport: HttpTransport = async (request) => {
    const response = await gotScraping(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.payload.length > 0 ? request.payload : undefined,
        followRedirect: request.followRedirect,
        throwHttpErrors: false,
        retry: { limit: 0 },
        timeout: { request: request.timeoutMillis },
        responseType: 'buffer',
        useHeaderGenerator: false,
        signal: request.signal,
    });

    return {
        statusCode: response.statusCode,
        url: response.url,
        body: response.body,
        setCookies: response.headers['set-cookie'] ?? [],
    };
};
