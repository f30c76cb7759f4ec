import type { Logger } from "winston";
import { RetryExhaustedError, toError } from "./WaybackErrors";
import { createLogger } from "../utils/Logger";

/**
 * Result of one attempt at a remote call. The tag decides what the policy does
 * next: `ok` stops, `retriable` sleeps and tries again, `terminal` gives up.
 */
export type StageResult<T> =
    | { kind: "ok", value: T }
    | { kind: "retriable", error: Error, retryAfter: number | null }
    | { kind: "terminal", error: Error };

export function ok<T>(value: T): StageResult<T> {
    return { kind: "ok", value: value };
}

export function retriable<T>(error: Error, retryAfter: number | null = null): StageResult<T> {
    return { kind: "retriable", error: error, retryAfter: retryAfter };
}

export function terminal<T>(error: Error): StageResult<T> {
    return { kind: "terminal", error: error };
}

export type DelayStrategy = "fixed" | "exponential";

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
    attempts: number,
    /** milliseconds */
    baseDelay: number,
    delayStrategy: DelayStrategy,
    maxDelay?: number,
    sleep?: Sleep
};

const logger: Logger = createLogger("RetryPolicy");

export const defaultSleep: Sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class RetryPolicy {
    private readonly name: string;
    private readonly attempts: number;
    private readonly baseDelay: number;
    private readonly delayStrategy: DelayStrategy;
    private readonly maxDelay: number | null;
    private readonly sleep: Sleep;

    constructor(name: string, options: RetryOptions) {
        this.name = name;
        this.attempts = Math.max(1, Math.floor(options.attempts));
        this.baseDelay = options.baseDelay;
        this.delayStrategy = options.delayStrategy;
        this.maxDelay = options.maxDelay ?? null;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Delay after the given failed attempt (1-based) when the operation did not
     * suggest one.
     */
    delayFor(attempt: number): number {
        const delay = this.delayStrategy === "fixed"
            ? this.baseDelay
            : this.baseDelay * Math.pow(2, attempt - 1);
        return this.maxDelay === null ? delay : Math.min(delay, this.maxDelay);
    }

    /**
     * @throws {RetryExhaustedError} when every attempt was retriable
     * @throws the terminal error as soon as an attempt returns one
     */
    async execute<T>(operation: () => Promise<StageResult<T>>): Promise<T> {
        let lastError: Error | null = null;
        for (let attempt = 1; attempt <= this.attempts; attempt++) {
            let result: StageResult<T>;
            try {
                result = await operation();
            } catch (error) {
                result = terminal(toError(error));
            }

            if (result.kind === "ok") {
                return result.value;
            }

            if (result.kind === "terminal") {
                logger.error(`${this.name} attempt ${attempt}/${this.attempts} failed, not retrying: ${result.error.message}`);
                throw result.error;
            }

            lastError = result.error;
            if (attempt === this.attempts) {
                break;
            }

            const delay = result.retryAfter ?? this.delayFor(attempt);
            logger.info(`${this.name} attempt ${attempt}/${this.attempts} failed, retrying in ${delay}ms: ${result.error.message}`);
            await this.sleep(delay);
        }

        const exhausted = new RetryExhaustedError(this.name, this.attempts, lastError ?? new Error("no attempts made"));
        logger.error(exhausted.message);
        throw exhausted;
    }
}
