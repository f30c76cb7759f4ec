import type { ResolvedUrl } from "./WaybackResolver";
import type { Sparkline } from "./archivers/WaybackResponses";

export function formatResolvedUrl(result: ResolvedUrl): string {
    switch (result.outcome) {
    case "found":
        return `${result.inputUrl} -> ${result.archiveUrl}`;
    case "archived":
        return `${result.inputUrl} -> ${result.archiveUrl} (new snapshot)`;
    case "notArchived":
        return `${result.inputUrl} -> not archived`;
    }
}

/** First and last capture, then one line per year with that year's capture total. */
export function formatHistory(url: string, sparkline: Sparkline): string[] {
    const lines = [
        `history of ${url}`,
        `first capture: ${sparkline.firstTimestamp ?? "none"}`,
        `last capture: ${sparkline.lastTimestamp ?? "none"}`
    ];

    for (const year of Object.keys(sparkline.years).sort()) {
        const total = sparkline.years[year].reduce((sum, count) => sum + count, 0);
        lines.push(`${year}: ${total}`);
    }

    return lines;
}
