export { WaybackResolver } from "./WaybackResolver";
export type { ResolveAllResult, ResolveOptions, ResolveOutcome, ResolvedUrl, WaybackResolverOptions,
    WaybackSubmissionEvent } from "./WaybackResolver";
export { readWaybackConfig, parseWaybackConfig, WaybackConfigSchema } from "./WaybackConfig";
export type { WaybackConfig } from "./WaybackConfig";
export { extractUrls, getValidUrl } from "./UrlInput";
export { AxiosArchiveTransport } from "./archivers/AxiosArchiveTransport";
export type { IArchiveTransport, TransportOutcome, TransportRequest } from "./archivers/IArchiveTransport";
export { RetryPolicy, ok, retriable, terminal } from "./archivers/RetryPolicy";
export type { DelayStrategy, RetryOptions, Sleep, StageResult } from "./archivers/RetryPolicy";
export { WaybackClient } from "./archivers/WaybackClient";
export type { SaveJob, SaveOutcome } from "./archivers/WaybackClient";
export * from "./archivers/WaybackErrors";
export type { AvailabilityResult, JobState, JobStatus, Sparkline } from "./archivers/WaybackResponses";
export { parseWaybackTimestamp } from "./archivers/WaybackTimestamp";
