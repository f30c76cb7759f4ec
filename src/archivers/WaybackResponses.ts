import { z } from "zod";
import { ResponseDecodeError } from "./WaybackErrors";

// ============================================================================
// UPSTREAM SCHEMAS
// ============================================================================

const AvailableResponseSchema = z.object({
    url: z.string(),
    archived_snapshots: z.object({
        closest: z.object({
            status: z.string(),
            available: z.boolean(),
            url: z.string(),
            timestamp: z.string()
        }).optional()
    })
});

// job_id is checked by the caller so that a missing id is reported as such
const SaveResponseSchema = z.object({
    url: z.string().optional(),
    job_id: z.string().optional(),
    message: z.string().optional()
});

const StatusResponseSchema = z.object({
    counters: z.object({
        embeds: z.number(),
        outlinks: z.number()
    }).optional(),
    duration_sec: z.number().optional(),
    first_archive: z.boolean().optional(),
    http_status: z.number().optional(),
    job_id: z.string().optional(),
    original_url: z.string().optional(),
    outlinks: z.array(z.string()).optional(),
    resources: z.array(z.string()).optional(),
    status: z.string(),
    status_ext: z.string().optional(),
    message: z.string().optional(),
    timestamp: z.string().optional()
});

const SparklineResponseSchema = z.object({
    years: z.record(z.string(), z.array(z.number())),
    first_ts: z.string().nullable(),
    last_ts: z.string().nullable(),
    status: z.record(z.string(), z.string())
});

// ============================================================================
// DECODED SHAPES
// ============================================================================

export type AvailabilityResult = {
    queriedUrl: string,
    found: boolean,
    snapshotUrl: string | null,
    snapshotTimestamp: string | null
};

export type SaveAcknowledgement = {
    url: string | null,
    jobId: string | null,
    message: string | null
};

export type JobState = "pending" | "success" | "error" | "other";

export type JobStatus = {
    jobId: string | null,
    status: JobState,
    /** the status string exactly as the upstream sent it */
    rawStatus: string,
    timestamp: string | null,
    originalUrl: string | null,
    message: string | null
};

export type Sparkline = {
    years: Record<string, number[]>,
    firstTimestamp: string | null,
    lastTimestamp: string | null,
    status: Record<string, string>
};

export type DecodeResult<T> =
    | { success: true, data: T }
    | { success: false, error: ResponseDecodeError };

function decodeWith<O, T>(
    responseName: string,
    schema: z.ZodType<O, z.ZodTypeDef, unknown>,
    body: string,
    map: (parsed: O) => T
): DecodeResult<T> {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { success: false, error: new ResponseDecodeError(responseName, reason, body) };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        return { success: false, error: new ResponseDecodeError(responseName, issues, body) };
    }

    return { success: true, data: map(parsed.data) };
}

function nonEmpty(value: string | undefined): string | null {
    return value === undefined || value === "" ? null : value;
}

export function toJobState(status: string): JobState {
    switch (status) {
    case "pending":
    case "success":
    case "error":
        return status;
    default:
        return "other";
    }
}

export function decodeAvailability(body: string): DecodeResult<AvailabilityResult> {
    return decodeWith("wayback available", AvailableResponseSchema, body, parsed => {
        const closest = parsed.archived_snapshots.closest;
        const snapshotUrl = nonEmpty(closest?.url);
        return {
            queriedUrl: parsed.url,
            found: snapshotUrl !== null,
            snapshotUrl: snapshotUrl,
            snapshotTimestamp: snapshotUrl === null ? null : nonEmpty(closest?.timestamp)
        };
    });
}

export function decodeSaveAcknowledgement(body: string): DecodeResult<SaveAcknowledgement> {
    return decodeWith("save", SaveResponseSchema, body, parsed => ({
        url: nonEmpty(parsed.url),
        jobId: nonEmpty(parsed.job_id),
        message: nonEmpty(parsed.message)
    }));
}

export function decodeJobStatus(body: string): DecodeResult<JobStatus> {
    return decodeWith("save status", StatusResponseSchema, body, parsed => ({
        jobId: nonEmpty(parsed.job_id),
        status: toJobState(parsed.status),
        rawStatus: parsed.status,
        timestamp: parsed.status === "success" ? nonEmpty(parsed.timestamp) : null,
        originalUrl: nonEmpty(parsed.original_url),
        message: nonEmpty(parsed.message) ?? nonEmpty(parsed.status_ext)
    }));
}

export function decodeSparkline(body: string): DecodeResult<Sparkline> {
    return decodeWith("sparkline", SparklineResponseSchema, body, parsed => ({
        years: parsed.years,
        firstTimestamp: parsed.first_ts,
        lastTimestamp: parsed.last_ts,
        status: parsed.status
    }));
}
