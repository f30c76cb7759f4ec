import { find } from "linkifyjs";

/**
 * Trims the input and checks it is an absolute http(s) URL. Adds https:// to
 * bare hostnames when asked.
 */
export function getValidUrl(url: string, addHttps: boolean): string | null {
    let returnUrl = url.trim();
    if (addHttps && !returnUrl.startsWith("http://") && !returnUrl.startsWith("https://")) {
        returnUrl = `https://${returnUrl}`;
    }

    try {
        const parsed = new URL(returnUrl);
        if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
            return null;
        }

        return returnUrl;
    } catch {
        return null;
    }
}

/** URLs found in free text, in order of appearance, without duplicates. */
export function extractUrls(text: string): string[] {
    const urls: string[] = [];
    for (const result of find(text, "url")) {
        const validUrl = getValidUrl(result.href, false);
        if (validUrl !== null && !urls.includes(validUrl)) {
            urls.push(validUrl);
        }
    }

    return urls;
}
