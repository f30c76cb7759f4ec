import { describe, it, expect, beforeEach } from "vitest";
import { createProgram, type CliDependencies } from "./CliProgram";
import { parseWaybackConfig, type WaybackConfig } from "./WaybackConfig";
import { WaybackResolver } from "./WaybackResolver";
import { WaybackClient } from "./archivers/WaybackClient";
import { FakeArchiveTransport, httpResponse, jsonResponse } from "./testing/FakeArchiveTransport";

function snapshotOf(url: string, timestamp: string) {
    return jsonResponse({
        url: url,
        archived_snapshots: {
            closest: { status: "200", available: true, url: `http://web.archive.org/web/${timestamp}/${url}`, timestamp: timestamp }
        }
    });
}

describe("wayback-resolve cli", () => {
    let transport: FakeArchiveTransport;
    let stdout: string[];
    let stderr: string[];
    let exitCode: number | null;
    let configPaths: string[];
    let files: Record<string, string>;
    let deps: CliDependencies;

    beforeEach(() => {
        transport = new FakeArchiveTransport();
        stdout = [];
        stderr = [];
        exitCode = null;
        configPaths = [];
        files = {};
        deps = {
            readConfig: (path: string): WaybackConfig => {
                configPaths.push(path);
                return parseWaybackConfig({ attempts: 2 }, {});
            },
            createResolver: (config, eventEmitter) => new WaybackResolver(
                new WaybackClient(transport, { rateLimitDelay: config.rateLimitDelay }),
                {
                    archiveRoot: config.archiveRoot,
                    retryDelay: config.retryDelay,
                    pollDelay: config.pollDelay,
                    maxPollDelay: config.maxPollDelay,
                    pendingDelay: config.pendingDelay,
                    sleep: async () => undefined,
                    eventEmitter: eventEmitter
                }
            ),
            readTextFile: (path: string) => files[path] ?? "",
            stdout: line => stdout.push(line),
            stderr: line => stderr.push(line),
            setExitCode: code => {
                exitCode = code;
            }
        };
    });

    async function run(...args: string[]): Promise<void> {
        const program = createProgram(deps);
        program.exitOverride();
        await program.parseAsync(args, { from: "user" });
    }

    it("prints one line per resolved url", async () => {
        transport
            .availability("https://example.com/a", snapshotOf("https://example.com/a", "20240101000000"))
            .availability("https://example.com/b", jsonResponse({ url: "https://example.com/b", archived_snapshots: {} }));

        await run("resolve", "https://example.com/a", "https://example.com/b");

        expect(stdout).toEqual([
            "https://example.com/a -> http://web.archive.org/web/20240101000000/https://example.com/a",
            "https://example.com/b -> not archived"
        ]);
        expect(stderr).toEqual([]);
        expect(exitCode).toBeNull();
        expect(configPaths).toEqual(["config.yaml"]);
    });

    it("resolves the urls found in an input file", async () => {
        files["links.txt"] = "read https://example.com/a and later https://example.com/a";
        transport.availability("https://example.com/a", snapshotOf("https://example.com/a", "20240101000000"));

        await run("resolve", "--input", "links.txt", "--config", "custom.yaml");

        expect(stdout).toEqual(["https://example.com/a -> http://web.archive.org/web/20240101000000/https://example.com/a"]);
        expect(configPaths).toEqual(["custom.yaml"]);
    });

    it("archives missing urls and reports the submission", async () => {
        const url = "https://example.com/new";
        transport
            .availability(url, jsonResponse({ url: url, archived_snapshots: {} }))
            .save(url, jsonResponse({ job_id: "job-9" }))
            .status("job-9", jsonResponse({ job_id: "job-9", status: "success", timestamp: "20240102030405" }));

        await run("resolve", "--archive", "--cookie", "test-cookie", url);

        expect(stdout).toEqual([`${url} -> https://web.archive.org/web/20240102030405/${url} (new snapshot)`]);
        expect(stderr).toEqual([`submitted ${url} for archiving (job job-9)`]);
        expect(transport.requestsTo("POST", "/save/")[0].headers?.["Cookie"]).toBe("test-cookie");
    });

    it("reports failed urls and sets the exit code", async () => {
        const url = "https://example.com/limited";
        transport.availability(url, httpResponse(429));

        await run("resolve", "--attempts", "1", url);

        expect(stdout).toEqual([]);
        expect(stderr).toEqual([
            `error: unable to resolve ${url} during availability: all 1 attempts of availability check failed: rate limited by wayback available api`
        ]);
        expect(exitCode).toBe(1);
    });

    it("complains when there is nothing to resolve", async () => {
        await run("resolve");

        expect(stderr).toEqual(["error: no URLs given"]);
        expect(exitCode).toBe(1);
    });

    it("prints the capture history", async () => {
        transport.sparkline("https://example.com/", jsonResponse({
            years: { "2024": [2, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1] },
            first_ts: "20240110000000",
            last_ts: "20241220000000",
            status: { "2024": "200000000002" }
        }));

        await run("history", "example.com/");

        expect(stdout).toEqual([
            "history of https://example.com/",
            "first capture: 20240110000000",
            "last capture: 20241220000000",
            "2024: 3"
        ]);
        expect(exitCode).toBeNull();
    });
});
