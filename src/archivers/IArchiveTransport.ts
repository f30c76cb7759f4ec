export type HttpMethod = "GET" | "POST";

export type TransportRequest = {
    method: HttpMethod,
    path: string,
    query?: Record<string, string>,
    body?: string,
    headers?: Record<string, string>
};

/**
 * A completed HTTP exchange, or a failure below HTTP (DNS, reset, timeout).
 * The body is always fully read, so nothing is left holding a connection.
 */
export type TransportOutcome =
    | { kind: "response", statusCode: number, body: string, location: string | null }
    | { kind: "networkError", error: Error };

export interface IArchiveTransport {
    send(request: TransportRequest): Promise<TransportOutcome>;
}
