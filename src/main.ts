import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { SnsPublisher } from './notifier.js';
import { runCheck } from './run.js';

await Actor.init();

const abortController = new AbortController();

Actor.on('aborting', async () => {
    abortController.abort();
    await setTimeout(1000);
    await Actor.exit();
});

const publisher = new SnsPublisher();

try {
    const config = loadConfig();
    log.info('Starting förråd check', { timeoutMillis: config.timeoutMillis, interpreter: config.interpreter });

    const result = await runCheck(config, { publisher, signal: abortController.signal });

    log.info('Done.', { ...result });
    publisher.close();
    await Actor.exit();
} catch (error) {
    publisher.close();
    log.exception(error instanceof Error ? error : new Error(String(error)), 'Förråd check failed');
    await Actor.fail(errorMessage(error));
}
