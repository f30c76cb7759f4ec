import type { EventEmitter } from "node:events";
import type { Logger } from "winston";
import type { WaybackConfig } from "./WaybackConfig";
import { getValidUrl } from "./UrlInput";
import { AxiosArchiveTransport } from "./archivers/AxiosArchiveTransport";
import { RetryPolicy, ok, retriable, terminal, type Sleep, type StageResult } from "./archivers/RetryPolicy";
import { WaybackClient, type SaveJob } from "./archivers/WaybackClient";
import { JobFailedError, JobPendingError, ProtocolError, ResolutionError, toError, type ResolutionStage } from "./archivers/WaybackErrors";
import type { JobStatus, Sparkline } from "./archivers/WaybackResponses";
import { buildSnapshotUrl, getTimestampFromSnapshotUrl, parseWaybackTimestamp } from "./archivers/WaybackTimestamp";
import { createLogger } from "./utils/Logger";

export type ResolveOutcome = "found" | "archived" | "notArchived";

export type ResolvedUrl = {
    inputUrl: string,
    outcome: ResolveOutcome,
    /** null only when the outcome is notArchived */
    archiveUrl: string | null,
    timestamp: string | null,
    datetime: Date | null
};

export type ResolveOptions = {
    attempts: number,
    archiveIfMissing?: boolean,
    cookie?: string | null
};

export type ResolveAllResult = {
    results: ResolvedUrl[],
    errors: ResolutionError[]
};

export type WaybackSubmissionEvent = {
    originalUrl: string,
    jobId: string | null
};

export type WaybackResolverOptions = {
    archiveRoot: string,
    retryDelay: number,
    pollDelay: number,
    maxPollDelay: number,
    pendingDelay: number,
    sleep?: Sleep,
    /** receives a SUBMISSION_EVENT whenever a save request is accepted */
    eventEmitter?: EventEmitter
};

export class WaybackResolver {
    static readonly SUBMISSION_EVENT = "submission";

    private readonly client: WaybackClient;
    private readonly archiveRoot: string;
    private readonly retryDelay: number;
    private readonly pollDelay: number;
    private readonly maxPollDelay: number;
    private readonly pendingDelay: number;
    private readonly sleep: Sleep | undefined;
    private readonly eventEmitter: EventEmitter | null;
    private readonly logger: Logger;

    constructor(client: WaybackClient, options: WaybackResolverOptions) {
        this.client = client;
        this.archiveRoot = options.archiveRoot;
        this.retryDelay = options.retryDelay;
        this.pollDelay = options.pollDelay;
        this.maxPollDelay = options.maxPollDelay;
        this.pendingDelay = options.pendingDelay;
        this.sleep = options.sleep;
        this.eventEmitter = options.eventEmitter ?? null;
        this.logger = createLogger("WaybackResolver");
    }

    static fromConfig(config: WaybackConfig, eventEmitter?: EventEmitter): WaybackResolver {
        const transport = new AxiosArchiveTransport({
            apiBase: config.apiBase,
            userAgent: config.userAgent,
            timeout: config.requestTimeout
        });
        const client = new WaybackClient(transport, { rateLimitDelay: config.rateLimitDelay });
        return new WaybackResolver(client, {
            archiveRoot: config.archiveRoot,
            retryDelay: config.retryDelay,
            pollDelay: config.pollDelay,
            maxPollDelay: config.maxPollDelay,
            pendingDelay: config.pendingDelay,
            eventEmitter: eventEmitter
        });
    }

    /**
     * Resolves every URL in order, one at a time. A failure is recorded in
     * `errors` and the next URL is resolved as usual; each URL ends up in
     * exactly one of the two lists.
     */
    async resolveAll(urls: string[], options: ResolveOptions): Promise<ResolveAllResult> {
        this.logger.info(`resolveAll() for ${urls.length} urls, archiveIfMissing=${options.archiveIfMissing ?? false}`);
        const results: ResolvedUrl[] = [];
        const errors: ResolutionError[] = [];
        for (const url of urls) {
            try {
                results.push(await this.resolveOne(url, options));
            } catch (error) {
                const resolutionError = error instanceof ResolutionError
                    ? error
                    : new ResolutionError(url, "input", toError(error));
                errors.push(resolutionError);
            }
        }

        this.logger.info(`resolveAll() finished with ${results.length} results and ${errors.length} errors`);
        return { results, errors };
    }

    /**
     * An existing snapshot always wins. Without one, the URL is only archived
     * when `archiveIfMissing` is set; otherwise the outcome is notArchived.
     * @throws {ResolutionError}
     */
    async resolveOne(url: string, options: ResolveOptions): Promise<ResolvedUrl> {
        const validUrl = getValidUrl(url, false);
        if (validUrl === null) {
            throw this.failed(url, "input", new Error(`${url} is not an absolute http(s) url`));
        }

        const availability = await this.runStage(validUrl, "availability", () =>
            this.fixedPolicy("availability check", options.attempts).execute(() => this.client.checkAvailability(validUrl))
        );

        if (availability.snapshotUrl !== null) {
            this.logger.info(`resolveOne() found snapshot ${availability.snapshotUrl} for url ${validUrl}`);
            const timestamp = availability.snapshotTimestamp ?? getTimestampFromSnapshotUrl(availability.snapshotUrl);
            return {
                inputUrl: url,
                outcome: "found",
                archiveUrl: availability.snapshotUrl,
                timestamp: timestamp,
                datetime: timestamp === null ? null : parseWaybackTimestamp(timestamp)
            };
        }

        if (!(options.archiveIfMissing ?? false)) {
            this.logger.info(`resolveOne() no snapshot for url ${validUrl}, not archiving`);
            return {
                inputUrl: url,
                outcome: "notArchived",
                archiveUrl: null,
                timestamp: null,
                datetime: null
            };
        }

        return await this.archive(url, validUrl, options);
    }

    /**
     * @throws {ResolutionError}
     */
    async checkHistory(url: string, attempts: number): Promise<Sparkline> {
        const validUrl = getValidUrl(url, false);
        if (validUrl === null) {
            throw this.failed(url, "input", new Error(`${url} is not an absolute http(s) url`));
        }

        return await this.runStage(validUrl, "history", () =>
            this.fixedPolicy("history lookup", attempts).execute(() => this.client.checkSparkline(validUrl))
        );
    }

    private async archive(inputUrl: string, validUrl: string, options: ResolveOptions): Promise<ResolvedUrl> {
        const saveOutcome = await this.runStage(validUrl, "save", () =>
            this.fixedPolicy("save request", options.attempts).execute(() => this.client.requestSave(validUrl, options.cookie ?? null))
        );

        if (saveOutcome.kind === "redirected") {
            this.emitSubmission({ originalUrl: validUrl, jobId: null });
            const timestamp = getTimestampFromSnapshotUrl(saveOutcome.archiveUrl);
            return {
                inputUrl: inputUrl,
                outcome: "archived",
                archiveUrl: saveOutcome.archiveUrl,
                timestamp: timestamp,
                datetime: timestamp === null ? null : parseWaybackTimestamp(timestamp)
            };
        }

        this.emitSubmission({ originalUrl: validUrl, jobId: saveOutcome.job.jobId });
        const status = await this.runStage(validUrl, "status", () => this.pollJob(saveOutcome.job, options.attempts));
        if (status.timestamp === null) {
            throw this.failed(validUrl, "status",
                new ProtocolError(`archive.org reported success for job ${saveOutcome.job.jobId} without a timestamp`));
        }

        // snapshot URLs are predictable, so the upstream is not asked again
        const archiveUrl = buildSnapshotUrl(this.archiveRoot, status.timestamp, validUrl);
        this.logger.info(`resolveOne() archived url ${validUrl} as ${archiveUrl}`);
        return {
            inputUrl: inputUrl,
            outcome: "archived",
            archiveUrl: archiveUrl,
            timestamp: status.timestamp,
            datetime: parseWaybackTimestamp(status.timestamp)
        };
    }

    private async pollJob(job: SaveJob, attempts: number): Promise<JobStatus> {
        const policy = new RetryPolicy("job status poll", {
            attempts: attempts,
            baseDelay: this.pollDelay,
            delayStrategy: "exponential",
            maxDelay: this.maxPollDelay,
            sleep: this.sleep
        });

        return await policy.execute(async (): Promise<StageResult<JobStatus>> => {
            const result = await this.client.checkJobStatus(job.jobId);
            if (result.kind !== "ok") {
                return result;
            }

            const status = result.value;
            switch (status.status) {
            case "pending":
                return retriable(new JobPendingError(job.jobId), this.pendingDelay);
            case "success":
                return ok(status);
            default:
                return terminal(new JobFailedError(job.jobId, status.rawStatus, status.message));
            }
        });
    }

    private fixedPolicy(name: string, attempts: number): RetryPolicy {
        return new RetryPolicy(name, {
            attempts: attempts,
            baseDelay: this.retryDelay,
            delayStrategy: "fixed",
            sleep: this.sleep
        });
    }

    private async runStage<T>(url: string, stage: ResolutionStage, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            throw this.failed(url, stage, toError(error));
        }
    }

    private failed(url: string, stage: ResolutionStage, cause: Error): ResolutionError {
        const resolutionError = new ResolutionError(url, stage, cause);
        this.logger.error(resolutionError.message);
        return resolutionError;
    }

    private emitSubmission(event: WaybackSubmissionEvent): void {
        if (this.eventEmitter !== null) {
            this.eventEmitter.emit(WaybackResolver.SUBMISSION_EVENT, event);
        }
    }
}
