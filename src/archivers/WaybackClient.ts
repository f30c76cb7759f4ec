import type { Logger } from "winston";
import type { IArchiveTransport, TransportOutcome } from "./IArchiveTransport";
import { ok, retriable, terminal, type StageResult } from "./RetryPolicy";
import { decodeAvailability, decodeJobStatus, decodeSaveAcknowledgement, decodeSparkline,
    type AvailabilityResult, type DecodeResult, type JobStatus, type Sparkline } from "./WaybackResponses";
import { NetworkError, ProtocolError, RateLimitedError, ServiceDeclinedError } from "./WaybackErrors";
import { createLogger } from "../utils/Logger";

export type SaveJob = {
    originalUrl: string,
    jobId: string
};

export type SaveOutcome =
    | { kind: "redirected", archiveUrl: string }
    | { kind: "job", job: SaveJob };

export type WaybackClientOptions = {
    /** suggested wait after a 429 on calls that back off at a fixed rate */
    rateLimitDelay: number
};

/**
 * One attempt at each of the upstream calls. Every method reports whether the
 * attempt succeeded, may be repeated, or should not be repeated; none of them
 * retries on its own.
 */
export class WaybackClient {
    private static readonly HTTP_TOO_MANY_REQUESTS = 429;
    private static readonly DECLINED_STATUS_CODES = [520, 523];
    private static readonly REDIRECT_STATUS_CODES = [301, 302];

    private readonly transport: IArchiveTransport;
    private readonly rateLimitDelay: number;
    private readonly logger: Logger;

    constructor(transport: IArchiveTransport, options: WaybackClientOptions) {
        this.transport = transport;
        this.rateLimitDelay = options.rateLimitDelay;
        this.logger = createLogger("WaybackClient");
    }

    async checkAvailability(url: string): Promise<StageResult<AvailabilityResult>> {
        this.logger.info(`checkAvailability() for url ${url}`);
        const outcome = await this.transport.send({
            method: "GET",
            path: "/wayback/available",
            query: { url: url }
        });

        return this.decodeOutcome("wayback available api", outcome, this.rateLimitDelay, decodeAvailability);
    }

    async requestSave(url: string, cookie: string | null): Promise<StageResult<SaveOutcome>> {
        this.logger.info(`requestSave() for url ${url}`);
        const form = new URLSearchParams({ capture_all: "1", url: url });
        const headers: Record<string, string> = {
            "Accept": "application/json",
            "Content-Type": "application/x-www-form-urlencoded"
        };
        if (cookie !== null) {
            headers["Cookie"] = cookie;
        }

        const outcome = await this.transport.send({
            method: "POST",
            path: "/save/",
            query: { capture_all: "1", url: url },
            body: form.toString(),
            headers: headers
        });

        if (outcome.kind === "networkError") {
            return retriable(new NetworkError("archive.org save api", outcome.error), this.rateLimitDelay);
        }

        const statusCode = outcome.statusCode;
        if (statusCode === WaybackClient.HTTP_TOO_MANY_REQUESTS) {
            return retriable(new RateLimitedError("archive.org save api"), this.rateLimitDelay);
        }

        if (WaybackClient.REDIRECT_STATUS_CODES.includes(statusCode)) {
            if (outcome.location === null) {
                return terminal(new ProtocolError(`archive.org replied ${statusCode} without a location header`));
            }

            this.logger.info(`requestSave() got redirected to ${outcome.location} for url ${url}`);
            return ok<SaveOutcome>({ kind: "redirected", archiveUrl: outcome.location });
        }

        if (WaybackClient.DECLINED_STATUS_CODES.includes(statusCode)) {
            return terminal(new ServiceDeclinedError(statusCode));
        }

        const decoded = decodeSaveAcknowledgement(outcome.body);
        if (!decoded.success) {
            return terminal(decoded.error);
        }

        if (decoded.data.jobId === null) {
            return terminal(new ProtocolError(`archive.org did not respond with a job_id: ${outcome.body}`));
        }

        this.logger.info(`requestSave() got job ${decoded.data.jobId} for url ${url}`);
        return ok<SaveOutcome>({ kind: "job", job: { originalUrl: url, jobId: decoded.data.jobId } });
    }

    /**
     * Fetches the job status as is; whether a pending or failed job is worth
     * polling again is up to the caller.
     */
    async checkJobStatus(jobId: string): Promise<StageResult<JobStatus>> {
        this.logger.info(`checkJobStatus() for job ${jobId}`);
        const outcome = await this.transport.send({
            method: "GET",
            path: `/save/status/${encodeURIComponent(jobId)}`
        });

        return this.decodeOutcome("wayback save status api", outcome, null, decodeJobStatus);
    }

    async checkSparkline(url: string): Promise<StageResult<Sparkline>> {
        this.logger.info(`checkSparkline() for url ${url}`);
        const outcome = await this.transport.send({
            method: "GET",
            path: "/__wb/sparkline/",
            query: { collection: "web", output: "json", url: url }
        });

        return this.decodeOutcome("wayback sparkline api", outcome, this.rateLimitDelay, decodeSparkline);
    }

    private decodeOutcome<T>(
        action: string,
        outcome: TransportOutcome,
        retryAfter: number | null,
        decode: (body: string) => DecodeResult<T>
    ): StageResult<T> {
        if (outcome.kind === "networkError") {
            return retriable(new NetworkError(action, outcome.error), retryAfter);
        }

        if (outcome.statusCode === WaybackClient.HTTP_TOO_MANY_REQUESTS) {
            return retriable(new RateLimitedError(action), retryAfter);
        }

        const decoded = decode(outcome.body);
        if (!decoded.success) {
            this.logger.error(`${action} returned ${outcome.statusCode} with a body that could not be decoded`);
            return terminal(decoded.error);
        }

        return ok(decoded.data);
    }
}
