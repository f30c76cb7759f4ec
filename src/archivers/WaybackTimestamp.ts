const TIMESTAMP_REGEX = new RegExp(String.raw`/([0-9]{14})(?:[a-z_]{2,3})?/`);

/**
 * Parses a 14 digit Wayback timestamp (yyyyMMddHHmmss, always UTC).
 */
export function parseWaybackTimestamp(timestamp: string): Date | null {
    if (!/^[0-9]{14}$/.test(timestamp)) {
        return null;
    }

    const year = parseInt(timestamp.substring(0, 4));
    const month = parseInt(timestamp.substring(4, 6));
    const day = parseInt(timestamp.substring(6, 8));
    const hour = parseInt(timestamp.substring(8, 10));
    const minute = parseInt(timestamp.substring(10, 12));
    const seconds = parseInt(timestamp.substring(12, 14));
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, seconds));

    // Date.UTC rolls invalid fields over (month 13, day 32) instead of failing
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day || date.getUTCHours() !== hour) {
        return null;
    }

    return date;
}

/** Finds the timestamp segment of a snapshot URL such as .../web/20240101000000/https://... */
export function getTimestampFromSnapshotUrl(url: string): string | null {
    const regexMatches = url.match(TIMESTAMP_REGEX);
    if (regexMatches === null) {
        return null;
    }

    return regexMatches[1];
}

export function buildSnapshotUrl(archiveRoot: string, timestamp: string, originalUrl: string): string {
    return `${archiveRoot.replace(/\/+$/, "")}/${timestamp}/${originalUrl}`;
}
