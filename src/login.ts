import { log } from 'apify';

import { requireSetting } from './config.js';
import { ENV_VARS, LOGIN_REDIRECT_STATUS, LOGIN_URL } from './constants.js';
import { buildRequest } from './request.js';
import { send } from './session.js';
import type { Config, Credentials, Session } from './types.js';

const LOG_PREFIX = '[login]';

export const readCredentials = (config: Config): Credentials => ({
    username: requireSetting(config.username, ENV_VARS.username),
    password: requireSetting(config.password, ENV_VARS.password),
});

/**
 * The portal has always been sent the values unescaped. `encode` form-encodes them
 * instead, for credentials containing `&`, `=` or `+`.
 */
export const buildLoginPayload = (credentials: Credentials, { encode = false }: { encode?: boolean } = {}): string => {
    if (encode) {
        return new URLSearchParams({ Username: credentials.username, Password: credentials.password }).toString();
    }
    return `Username=${credentials.username}&Password=${credentials.password}`;
};

/** Logs in on `session`. A 302 is the only accepted answer; the cookies it sets stay in the session. */
export const login = async (session: Session, config: Config, headers: Record<string, string>): Promise<void> => {
    const payload = buildLoginPayload(readCredentials(config), { encode: config.encodeCredentials });
    const request = buildRequest('POST', LOGIN_URL, payload, {
        ...headers,
        'Content-Type': 'application/x-www-form-urlencoded',
    });

    await send(session, request, LOGIN_REDIRECT_STATUS);
    log.info(`${LOG_PREFIX} Logged in`);
};
