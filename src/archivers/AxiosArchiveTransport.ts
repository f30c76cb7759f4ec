import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { Logger } from "winston";
import type { IArchiveTransport, TransportOutcome, TransportRequest } from "./IArchiveTransport";
import { toError } from "./WaybackErrors";
import { createLogger } from "../utils/Logger";

export type AxiosArchiveTransportOptions = {
    apiBase: string,
    userAgent: string | null,
    /** milliseconds, 0 for none */
    timeout: number,
    instance?: AxiosInstance
};

export class AxiosArchiveTransport implements IArchiveTransport {
    private readonly apiBase: string;
    private readonly userAgent: string | null;
    private readonly timeout: number;
    private readonly instance: AxiosInstance;
    private readonly logger: Logger;

    constructor(options: AxiosArchiveTransportOptions) {
        this.apiBase = options.apiBase.replace(/\/+$/, "");
        this.userAgent = options.userAgent;
        this.timeout = options.timeout;
        this.instance = options.instance ?? axios.create();
        this.logger = createLogger("AxiosArchiveTransport");
    }

    async send(request: TransportRequest): Promise<TransportOutcome> {
        const fullUrl = `${this.apiBase}${request.path}`;
        this.logger.debug(`send() ${request.method} ${fullUrl} ${JSON.stringify(request.query ?? {})}`);

        const headers: Record<string, string> = { ...request.headers };
        if (this.userAgent !== null) {
            headers["User-Agent"] = this.userAgent;
        }

        // every status is a response and redirects are left to the caller;
        // the text body is read in full before the promise settles
        const axiosConfig: AxiosRequestConfig = {
            method: request.method,
            url: fullUrl,
            params: request.query,
            data: request.body,
            headers: headers,
            timeout: this.timeout,
            maxRedirects: 0,
            responseType: "text",
            validateStatus: () => true
        };

        try {
            const response = await this.instance.request<unknown>(axiosConfig);
            const location: unknown = response.headers["location"];
            return {
                kind: "response",
                statusCode: response.status,
                body: AxiosArchiveTransport.bodyToString(response.data),
                location: typeof location === "string" && location !== "" ? location : null
            };
        } catch (error) {
            const networkError = toError(error);
            this.logger.error(`send() ${request.method} ${fullUrl} failed: ${networkError.message}`);
            return {
                kind: "networkError",
                error: networkError
            };
        }
    }

    private static bodyToString(data: unknown): string {
        if (typeof data === "string") {
            return data;
        }

        return data === undefined || data === null ? "" : JSON.stringify(data);
    }
}
