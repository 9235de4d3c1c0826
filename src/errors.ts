export class MonitorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends MonitorError {
    constructor(
        readonly variable: string,
        message = `couldn't get ${variable} from environment`,
    ) {
        super(message);
    }
}

export class SessionSetupError extends MonitorError {}

export class RequestConstructionError extends MonitorError {}

export class NetworkError extends MonitorError {}

/** The response status differed from the expected one. Carries the body for diagnostics. */
export class StatusMismatchError extends MonitorError {
    constructor(
        readonly wanted: number,
        readonly got: number,
        readonly url: string,
        readonly body: Buffer,
    ) {
        super(`status code mismatch. wanted ${wanted} got ${got} for ${url}`);
    }
}

export class ResponseFormatError extends MonitorError {}

export class PublishError extends MonitorError {}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
