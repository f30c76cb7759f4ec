import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./archivers/WaybackErrors";

export const WaybackConfigSchema = z.object({
    apiBase: z.string().url().default("https://wwwb-api.archive.org"),
    archiveRoot: z.string().url().default("https://web.archive.org/web"),
    userAgent: z.string().nullable().default(null),
    /** milliseconds per request, 0 for none */
    requestTimeout: z.number().int().nonnegative().default(30000),
    attempts: z.number().int().positive().default(3),
    archiveIfMissing: z.boolean().default(false),
    cookie: z.string().nullable().default(null),
    /** base delay of the availability, save and history retries */
    retryDelay: z.number().int().nonnegative().default(1000),
    /** base delay of the exponential job status backoff */
    pollDelay: z.number().int().nonnegative().default(1000),
    maxPollDelay: z.number().int().nonnegative().default(30000),
    rateLimitDelay: z.number().int().nonnegative().default(1000),
    pendingDelay: z.number().int().nonnegative().default(3000)
});

export type WaybackConfig = z.infer<typeof WaybackConfigSchema>;

export const COOKIE_ENV_VAR = "WAYBACK_COOKIE";

/**
 * @throws {ConfigError}
 */
export function parseWaybackConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): WaybackConfig {
    const parsed = WaybackConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid config: ${issues}`);
    }

    const envCookie = env[COOKIE_ENV_VAR];
    if (envCookie !== undefined && envCookie !== "") {
        return { ...parsed.data, cookie: envCookie };
    }

    return parsed.data;
}

/**
 * Reads a YAML config file. A missing file yields the defaults.
 * @throws {ConfigError}
 */
export function readWaybackConfig(path: string, env: NodeJS.ProcessEnv = process.env): WaybackConfig {
    if (!existsSync(path)) {
        return parseWaybackConfig({}, env);
    }

    let raw: unknown;
    try {
        raw = parseYaml(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigError(`Unable to read config ${path}: ${error}`, { cause: error });
    }

    return parseWaybackConfig(raw, env);
}
