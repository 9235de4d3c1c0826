import { EPOCH_PLACEHOLDER } from './constants.js';
import { RequestConstructionError } from './errors.js';
import type { HttpMethod, OutboundRequest } from './types.js';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

const isHttpMethod = (method: string): method is HttpMethod => HTTP_METHODS.some((known) => known === method);

/** Sets a header, replacing any existing one whose name differs only in case. */
export const setHeader = (headers: Record<string, string>, name: string, value: string): void => {
    const lower = name.toLowerCase();
    for (const existing of Object.keys(headers)) {
        if (existing.toLowerCase() === lower) delete headers[existing];
    }
    headers[name] = value;
};

export const substituteEpoch = (urlTemplate: string, now: () => number = Date.now): string =>
    urlTemplate.replaceAll(EPOCH_PLACEHOLDER, Math.trunc(now()).toString(10));

export const buildRequest = (
    method: string,
    urlTemplate: string,
    payload: Buffer | string = Buffer.alloc(0),
    headers: Record<string, string> = {},
    now: () => number = Date.now,
): OutboundRequest => {
    const url = substituteEpoch(urlTemplate, now);

    if (!TOKEN.test(method)) {
        throw new RequestConstructionError(`couldn't create request for ${method} ${url}. invalid method`);
    }
    const upper = method.toUpperCase();
    if (!isHttpMethod(upper)) {
        throw new RequestConstructionError(`couldn't create request for ${method} ${url}. unsupported method`);
    }

    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        throw new RequestConstructionError(`couldn't create request for ${method} ${url}. invalid URL`, {
            cause: error,
        });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new RequestConstructionError(
            `couldn't create request for ${method} ${url}. unsupported protocol ${parsed.protocol}`,
        );
    }

    const requestHeaders: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        setHeader(requestHeaders, name, value);
    }

    return Object.freeze({
        method: upper,
        url,
        payload: typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload,
        headers: Object.freeze(requestHeaders),
    });
};
