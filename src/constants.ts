export const SITE_URL = 'https://www.stockholmshem.se';

export const LOGIN_URL = `${SITE_URL}/logga-in/?returnUrl=/mina-sidor/smaforrad/`;
export const WIDGETS_URL = `${SITE_URL}/widgets/?callback=jQuery17105048823634686723_{epoch}&widgets%5B%5D=alert&widgets%5B%5D=objektlista%40forrad&_={epoch}`;

export const EPOCH_PLACEHOLDER = '{epoch}';

export const LOGIN_REDIRECT_STATUS = 302;
export const WIDGETS_OK_STATUS = 200;

export const DEFAULT_TIMEOUT_MS = 10_000;
export const MAX_TIMEOUT_MS = 300_000;

/** Shown by the storage-unit widget when the search is empty. */
export const NO_RESULTS_MARKER = 'Sökningen gav inga träffar';

export const NOTIFICATION_SUBJECT = 'Nytt förråd!';
export const NOTIFICATION_MESSAGE = `Det verkar finnas ett nytt förråd tillgängligt!\n\nGå till ${SITE_URL}/mina-sidor/smaforrad/ för att kontrollera`;

export const ENV_VARS = {
    username: 'PERSONNR',
    password: 'PASSWORD',
    topic: 'TOPIC',
    timeout: 'TIMEOUT_MS',
    interpreter: 'AVAILABILITY_INTERPRETER',
    encodeCredentials: 'ENCODE_CREDENTIALS',
} as const;

export const FETCH_HEADERS = {
    'User-Agent':
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/84.0.4147.89 Safari/537.36',
    Accept: '*/*',
    'Content-Type': 'application/x-www-form-urlencoded',
};
