import { checkAvailability, resolveInterpreter } from './availability.js';
import { FETCH_HEADERS } from './constants.js';
import { login } from './login.js';
import { notify } from './notifier.js';
import { createSession } from './session.js';
import type { AvailabilityInterpreter, Config, HttpTransport, Publisher, RunResult } from './types.js';

export interface RunDependencies {
    publisher: Publisher;
    transport?: HttpTransport;
    signal?: AbortSignal;
    interpreter?: AvailabilityInterpreter;
}

/** One check: log in, look for storage units, notify if there are any. */
export const runCheck = async (config: Config, deps: RunDependencies): Promise<RunResult> => {
    const session = createSession(config.timeoutMillis, { transport: deps.transport, signal: deps.signal });

    await login(session, config, FETCH_HEADERS);
    const available = await checkAvailability(
        session,
        FETCH_HEADERS,
        deps.interpreter ?? resolveInterpreter(config.interpreter),
    );
    const notified = await notify(available, config, deps.publisher, deps.signal);

    return { available, notified };
};
