/**
 * Slug handling: human names -> profile slugs -> storage key fragments
 */
import { FALLBACK_SLUG } from "../constants";

export function toIdentifier(name: string | null | undefined): string {
    const slug = String(name ?? "")
        .replace(/[^A-Za-z0-9]+/g, "-")
        .replace(/^-+|-+$/g, "")
        .toLowerCase();
    return slug || FALLBACK_SLUG;
}

export function toStorageKeyFragment(slug: string): string {
    return slug.replace(/[^A-Za-z0-9]/g, "_").toUpperCase();
}

/** Host part of a base URL, slugified. Used as the suggested profile name. */
export function defaultNameFromUrl(url: string): string {
    const schemeEnd = url.indexOf("://");
    let host = schemeEnd >= 0 ? url.slice(schemeEnd + 3) : url;
    const slash = host.indexOf("/");
    if (slash >= 0) host = host.slice(0, slash);
    return toIdentifier(host);
}
