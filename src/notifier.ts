import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { log } from 'apify';

import { requireSetting } from './config.js';
import { ENV_VARS, NOTIFICATION_MESSAGE, NOTIFICATION_SUBJECT } from './constants.js';
import { errorMessage, PublishError } from './errors.js';
import type { Config, Notification, Publisher } from './types.js';

const LOG_PREFIX = '[notify]';

export class SnsPublisher implements Publisher {
    constructor(private readonly client: SNSClient = new SNSClient({})) {}

    async publish({ subject, message, topic }: Notification, signal?: AbortSignal): Promise<void> {
        await this.client.send(
            new PublishCommand({ TopicArn: topic, Subject: subject, Message: message }),
            { abortSignal: signal },
        );
    }

    /** Releases the client's sockets. */
    close(): void {
        this.client.destroy();
    }
}

/**
 * Publishes the new-storage-unit notification when `available` is set.
 * Returns whether a notification went out.
 */
export const notify = async (
    available: boolean,
    config: Config,
    publisher: Publisher,
    signal?: AbortSignal,
): Promise<boolean> => {
    if (!available) return false;

    log.info(`${LOG_PREFIX} New förråd detected!`);
    const topic = requireSetting(config.topicArn, ENV_VARS.topic);

    try {
        await publisher.publish({ subject: NOTIFICATION_SUBJECT, message: NOTIFICATION_MESSAGE, topic }, signal);
    } catch (error) {
        throw new PublishError(`couldn't publish to sns. ${errorMessage(error)}`, { cause: error });
    }

    log.info(`${LOG_PREFIX} Notification published`, { topic });
    return true;
};
