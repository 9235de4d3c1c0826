import type { CookieJar } from 'tough-cookie';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';
export type InterpreterName = 'marker' | 'jsonp';

export interface Config {
    username: string | undefined; // PERSONNR
    password: string | undefined;
    topicArn: string | undefined;
    timeoutMillis: number;
    interpreter: InterpreterName;
    encodeCredentials: boolean;
}

export interface Credentials {
    username: string;
    password: string;
}

export interface OutboundRequest {
    readonly method: HttpMethod;
    readonly url: string;
    readonly payload: Buffer;
    readonly headers: Readonly<Record<string, string>>;
}

/** What the transport gets: the built request plus the session's transport settings. */
export interface TransportRequest {
    method: HttpMethod;
    url: string;
    payload: Buffer;
    headers: Record<string, string>;
    timeoutMillis: number;
    followRedirect: boolean;
    signal?: AbortSignal;
}

export interface TransportResponse {
    statusCode: number;
    url: string; // final URL
    body: Buffer;
    setCookies: string[];
}

export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export interface Session {
    readonly cookieJar: CookieJar;
    readonly timeoutMillis: number;
    readonly followRedirect: false;
    readonly transport: HttpTransport;
    readonly signal?: AbortSignal;
}

export interface ResponseResult {
    body: Buffer;
    statusCode: number;
    url: string;
}

/** Decides from the decoded response body whether any unit is available. */
export type AvailabilityInterpreter = (body: string) => boolean;

export interface Notification {
    subject: string;
    message: string;
    topic: string;
}

export interface Publisher {
    publish: (notification: Notification, signal?: AbortSignal) => Promise<void>;
}

export interface RunResult {
    available: boolean;
    notified: boolean;
}
