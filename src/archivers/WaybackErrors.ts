export type ResolutionStage = "input" | "availability" | "save" | "status" | "history";

export class WaybackError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "WaybackError";
    }
}

/**
 * The body did not match the expected response shape. The raw body is kept
 * for diagnostics.
 */
export class ResponseDecodeError extends WaybackError {
    readonly body: string;

    constructor(responseName: string, issues: string, body: string) {
        super(`unable to decode ${responseName} response: ${issues}, body: ${body}`);
        this.name = "ResponseDecodeError";
        this.body = body;
    }
}

export class NetworkError extends WaybackError {
    constructor(action: string, cause: Error) {
        super(`error calling ${action}: ${cause.message}`, { cause: cause });
        this.name = "NetworkError";
    }
}

export class RateLimitedError extends WaybackError {
    constructor(action: string) {
        super(`rate limited by ${action}`);
        this.name = "RateLimitedError";
    }
}

export class JobPendingError extends WaybackError {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`job ${jobId} is still pending`);
        this.name = "JobPendingError";
        this.jobId = jobId;
    }
}

export class ServiceDeclinedError extends WaybackError {
    readonly statusCode: number;

    constructor(statusCode: number) {
        super(`${statusCode}: archive.org declined to archive that page`);
        this.name = "ServiceDeclinedError";
        this.statusCode = statusCode;
    }
}

/** An expected field (job_id, Location header, timestamp) was absent. */
export class ProtocolError extends WaybackError {
    constructor(message: string) {
        super(message);
        this.name = "ProtocolError";
    }
}

export class JobFailedError extends WaybackError {
    readonly jobId: string;
    readonly status: string;

    constructor(jobId: string, status: string, upstreamMessage: string | null) {
        const detail = upstreamMessage === null ? "" : ` (${upstreamMessage})`;
        super(`archive.org request had unexpected status: ${status}${detail}`);
        this.name = "JobFailedError";
        this.jobId = jobId;
        this.status = status;
    }
}

export class RetryExhaustedError extends WaybackError {
    readonly attempts: number;
    readonly lastError: Error;

    constructor(policyName: string, attempts: number, lastError: Error) {
        super(`all ${attempts} attempts of ${policyName} failed: ${lastError.message}`, { cause: lastError });
        this.name = "RetryExhaustedError";
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export class ResolutionError extends WaybackError {
    readonly url: string;
    readonly stage: ResolutionStage;

    constructor(url: string, stage: ResolutionStage, cause: Error) {
        super(`unable to resolve ${url} during ${stage}: ${cause.message}`, { cause: cause });
        this.name = "ResolutionError";
        this.url = url;
        this.stage = stage;
    }
}

export class ConfigError extends WaybackError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
