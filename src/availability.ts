import { log } from 'apify';

import { NO_RESULTS_MARKER, WIDGETS_OK_STATUS, WIDGETS_URL } from './constants.js';
import { ResponseFormatError } from './errors.js';
import { buildRequest } from './request.js';
import { send } from './session.js';
import type { AvailabilityInterpreter, InterpreterName, Session } from './types.js';

const LOG_PREFIX = '[availability]';
// cb(...), optionally behind a `/**/` guard and/or `typeof cb === 'function' && `
const JSONP =
    /^\s*(?:\/\*\*\/\s*)?(?:typeof\s+[\w$.]+\s*===?\s*['"]function['"]\s*&&\s*)?[\w$.]+\s*\(([\s\S]*)\)\s*;?\s*$/;

/** Available unless the body contains `marker` verbatim. */
export const markerInterpreter =
    (marker: string = NO_RESULTS_MARKER): AvailabilityInterpreter =>
    (body) =>
        !body.includes(marker);

/** Parses the argument of a `callback(<json>)` body. */
export const unwrapJsonp = (body: string): unknown => {
    const match = JSONP.exec(body);
    if (!match) {
        throw new ResponseFormatError('response is not a JSONP callback');
    }
    try {
        const payload: unknown = JSON.parse(match[1]);
        return payload;
    } catch (error) {
        throw new ResponseFormatError('JSONP payload is not valid JSON', { cause: error });
    }
};

const collectStrings = (value: unknown): string[] => {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value)) return value.flatMap(collectStrings);
    if (value !== null && typeof value === 'object') return Object.values(value).flatMap(collectStrings);
    return [];
};

/** Decodes the JSONP payload first, so escaped characters in the widget markup still match. */
export const jsonpInterpreter =
    (marker: string = NO_RESULTS_MARKER): AvailabilityInterpreter =>
    (body) =>
        !collectStrings(unwrapJsonp(body)).some((text) => text.includes(marker));

export const resolveInterpreter = (name: InterpreterName): AvailabilityInterpreter =>
    name === 'jsonp' ? jsonpInterpreter() : markerInterpreter();

export const checkAvailability = async (
    session: Session,
    headers: Record<string, string>,
    interpreter: AvailabilityInterpreter = markerInterpreter(),
): Promise<boolean> => {
    const request = buildRequest('GET', WIDGETS_URL, undefined, headers);
    const { body } = await send(session, request, WIDGETS_OK_STATUS);

    const available = interpreter(body.toString('utf8'));
    log.info(`${LOG_PREFIX} Checked storage units`, { available, bytes: body.length });
    return available;
};
