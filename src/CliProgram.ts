import { EventEmitter } from "node:events";
import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { readWaybackConfig, type WaybackConfig } from "./WaybackConfig";
import { WaybackResolver, type WaybackSubmissionEvent } from "./WaybackResolver";
import { extractUrls, getValidUrl } from "./UrlInput";
import { formatHistory, formatResolvedUrl } from "./ResultFormatter";
import { createLogger } from "./utils/Logger";

type ResolveCommandOptions = {
    input?: string,
    attempts?: number,
    archive?: boolean,
    cookie?: string,
    config: string
};

type HistoryCommandOptions = {
    attempts?: number,
    config: string
};

export type CliDependencies = {
    readConfig: (path: string) => WaybackConfig,
    createResolver: (config: WaybackConfig, eventEmitter: EventEmitter) => WaybackResolver,
    readTextFile: (path: string) => string,
    stdout: (line: string) => void,
    stderr: (line: string) => void,
    setExitCode: (code: number) => void
};

const DEFAULT_CONFIG_PATH = "config.yaml";

const defaultDependencies: CliDependencies = {
    readConfig: path => readWaybackConfig(path),
    createResolver: (config, eventEmitter) => WaybackResolver.fromConfig(config, eventEmitter),
    readTextFile: path => readFileSync(path, "utf-8"),
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    setExitCode: code => {
        process.exitCode = code;
    }
};

function parsePositiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
        throw new InvalidArgumentError("Must be a positive integer.");
    }

    return parsed;
}

/**
 * URLs from the arguments followed by those found in the input file, without
 * duplicates. Arguments that are not URLs are kept so they are reported.
 */
function collectUrls(args: string[], inputText: string | null): string[] {
    const urls: string[] = [];
    const candidates = args.map(arg => getValidUrl(arg, true) ?? arg);
    if (inputText !== null) {
        candidates.push(...extractUrls(inputText));
    }

    for (const candidate of candidates) {
        if (!urls.includes(candidate)) {
            urls.push(candidate);
        }
    }

    return urls;
}

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
    const logger = createLogger("cli");
    const program = new Command();
    program
        .name("wayback-resolve")
        .description("Resolve URLs to Wayback Machine snapshots, archiving the ones that are missing.");

    program
        .command("resolve")
        .description("Find the latest snapshot of each URL")
        .argument("[urls...]", "URLs to resolve")
        .option("-i, --input <file>", "also resolve every URL found in a text file")
        .option("-a, --attempts <n>", "attempts per remote call", parsePositiveInt)
        .option("--archive", "archive URLs that have no snapshot yet")
        .option("--cookie <cookie>", "archive.org session cookie used for save requests")
        .option("-c, --config <path>", "YAML config file", DEFAULT_CONFIG_PATH)
        .action(async (args: string[], options: ResolveCommandOptions) => {
            const config = deps.readConfig(options.config);
            const inputText = options.input === undefined ? null : deps.readTextFile(options.input);
            const urls = collectUrls(args, inputText);
            if (urls.length === 0) {
                deps.stderr("error: no URLs given");
                deps.setExitCode(1);
                return;
            }

            const eventEmitter = new EventEmitter();
            eventEmitter.on(WaybackResolver.SUBMISSION_EVENT, (event: WaybackSubmissionEvent) => {
                const job = event.jobId === null ? "" : ` (job ${event.jobId})`;
                deps.stderr(`submitted ${event.originalUrl} for archiving${job}`);
            });

            const resolver = deps.createResolver(config, eventEmitter);
            const { results, errors } = await resolver.resolveAll(urls, {
                attempts: options.attempts ?? config.attempts,
                archiveIfMissing: options.archive ?? config.archiveIfMissing,
                cookie: options.cookie ?? config.cookie
            });
            eventEmitter.removeAllListeners(WaybackResolver.SUBMISSION_EVENT);

            for (const result of results) {
                deps.stdout(formatResolvedUrl(result));
            }

            for (const error of errors) {
                deps.stderr(`error: ${error.message}`);
            }

            if (errors.length > 0) {
                logger.error(`${errors.length} of ${urls.length} urls could not be resolved`);
                deps.setExitCode(1);
            }
        });

    program
        .command("history")
        .description("Show when a URL was captured")
        .argument("<url>", "URL to look up")
        .option("-a, --attempts <n>", "attempts per remote call", parsePositiveInt)
        .option("-c, --config <path>", "YAML config file", DEFAULT_CONFIG_PATH)
        .action(async (url: string, options: HistoryCommandOptions) => {
            const config = deps.readConfig(options.config);
            const resolver = deps.createResolver(config, new EventEmitter());
            const validUrl = getValidUrl(url, true) ?? url;
            try {
                const sparkline = await resolver.checkHistory(validUrl, options.attempts ?? config.attempts);
                for (const line of formatHistory(validUrl, sparkline)) {
                    deps.stdout(line);
                }
            } catch (error) {
                deps.stderr(`error: ${error instanceof Error ? error.message : String(error)}`);
                deps.setExitCode(1);
            }
        });

    return program;
}
