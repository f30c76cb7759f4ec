import { describe, it, expect } from "vitest";
import { decodeAvailability, decodeJobStatus, decodeSaveAcknowledgement, decodeSparkline } from "./WaybackResponses";
import { ResponseDecodeError } from "./WaybackErrors";

describe("decodeAvailability", () => {
    it("decodes the closest snapshot", () => {
        const body = JSON.stringify({
            url: "example.com/page",
            archived_snapshots: {
                closest: {
                    status: "200",
                    available: true,
                    url: "http://web.archive.org/web/20240101000000/https://example.com/page",
                    timestamp: "20240101000000"
                }
            }
        });

        expect(decodeAvailability(body)).toEqual({
            success: true,
            data: {
                queriedUrl: "example.com/page",
                found: true,
                snapshotUrl: "http://web.archive.org/web/20240101000000/https://example.com/page",
                snapshotTimestamp: "20240101000000"
            }
        });
    });

    it("reports a missing snapshot as not found", () => {
        const result = decodeAvailability(JSON.stringify({ url: "example.com/none", archived_snapshots: {} }));

        expect(result).toEqual({
            success: true,
            data: { queriedUrl: "example.com/none", found: false, snapshotUrl: null, snapshotTimestamp: null }
        });
    });

    it("keeps the raw body when the payload is not JSON", () => {
        const result = decodeAvailability("<html>busy</html>");

        expect(result.success).toBe(false);
        if (result.success) {
            return;
        }
        expect(result.error).toBeInstanceOf(ResponseDecodeError);
        expect(result.error.body).toBe("<html>busy</html>");
        expect(result.error.message).toMatch(/^unable to decode wayback available response: .*, body: <html>busy<\/html>$/);
    });

    it("rejects a payload that only partially matches", () => {
        const result = decodeAvailability(JSON.stringify({ url: "example.com" }));

        expect(result.success).toBe(false);
        if (result.success) {
            return;
        }
        expect(result.error.message).toBe(
            "unable to decode wayback available response: archived_snapshots: Required, body: {\"url\":\"example.com\"}"
        );
    });
});

describe("decodeSaveAcknowledgement", () => {
    it("decodes the job id", () => {
        const body = JSON.stringify({ url: "https://example.com/", job_id: "spn2-abc", message: "" });

        expect(decodeSaveAcknowledgement(body)).toEqual({
            success: true,
            data: { url: "https://example.com/", jobId: "spn2-abc", message: null }
        });
    });

    it("leaves a missing job id to the caller", () => {
        const result = decodeSaveAcknowledgement(JSON.stringify({ message: "You need to be logged in" }));

        expect(result).toEqual({
            success: true,
            data: { url: null, jobId: null, message: "You need to be logged in" }
        });
    });

    it("fails on a body that is not an object", () => {
        expect(decodeSaveAcknowledgement("[]").success).toBe(false);
    });
});

describe("decodeJobStatus", () => {
    it("decodes a successful capture", () => {
        const body = JSON.stringify({
            counters: { embeds: 3, outlinks: 10 },
            duration_sec: 6.2,
            first_archive: false,
            http_status: 200,
            job_id: "spn2-abc",
            original_url: "https://example.com/",
            outlinks: ["https://example.com/about"],
            resources: ["https://example.com/style.css"],
            status: "success",
            timestamp: "20240102030405"
        });

        expect(decodeJobStatus(body)).toEqual({
            success: true,
            data: {
                jobId: "spn2-abc",
                status: "success",
                rawStatus: "success",
                timestamp: "20240102030405",
                originalUrl: "https://example.com/",
                message: null
            }
        });
    });

    it("ignores a timestamp on a job that has not finished", () => {
        const result = decodeJobStatus(JSON.stringify({ job_id: "spn2-abc", status: "pending", timestamp: "20240102030405" }));

        expect(result.success && result.data.status).toBe("pending");
        expect(result.success && result.data.timestamp).toBeNull();
    });

    it("keeps the upstream explanation of a failed job", () => {
        const result = decodeJobStatus(JSON.stringify({
            job_id: "spn2-abc",
            status: "error",
            status_ext: "error:too-many-daily-captures"
        }));

        expect(result.success && result.data).toEqual({
            jobId: "spn2-abc",
            status: "error",
            rawStatus: "error",
            timestamp: null,
            originalUrl: null,
            message: "error:too-many-daily-captures"
        });
    });

    it("maps unknown statuses to other", () => {
        const result = decodeJobStatus(JSON.stringify({ status: "queued" }));

        expect(result.success && result.data.status).toBe("other");
        expect(result.success && result.data.rawStatus).toBe("queued");
    });

    it("requires a status", () => {
        expect(decodeJobStatus(JSON.stringify({ job_id: "spn2-abc" })).success).toBe(false);
    });
});

describe("decodeSparkline", () => {
    it("decodes capture history", () => {
        const body = JSON.stringify({
            years: { "2023": [0, 1, 2, 0, 0, 0, 0, 0, 0, 0, 0, 3] },
            first_ts: "20230201000000",
            last_ts: "20231215000000",
            status: { "2023": "422222222222" }
        });

        expect(decodeSparkline(body)).toEqual({
            success: true,
            data: {
                years: { "2023": [0, 1, 2, 0, 0, 0, 0, 0, 0, 0, 0, 3] },
                firstTimestamp: "20230201000000",
                lastTimestamp: "20231215000000",
                status: { "2023": "422222222222" }
            }
        });
    });

    it("accepts a URL that was never captured", () => {
        const result = decodeSparkline(JSON.stringify({ years: {}, first_ts: null, last_ts: null, status: {} }));

        expect(result.success && result.data.firstTimestamp).toBeNull();
    });
});
