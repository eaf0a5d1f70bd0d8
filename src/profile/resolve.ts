/**
 * Profile resolution utilities
 */
import { toIdentifier } from "./slug";

/**
 * Resolve an index or name to a stored slug.
 *
 * All-digit tokens are always read as 1-based indices, so a profile named
 * "2" can only be reached by its slug through a non-numeric spelling.
 */
export function resolveProfileSlug(token: string, slugs: readonly string[]): string | null {
    const raw = String(token ?? "").trim();
    if (!raw) return null;
    if (/^[0-9]+$/.test(raw)) {
        const idx = Number.parseInt(raw, 10) - 1;
        if (idx >= 0 && idx < slugs.length) return slugs[idx];
        return null;
    }
    const slug = toIdentifier(raw);
    return slugs.includes(slug) ? slug : null;
}

export function ensureUniqueSlug(candidate: string, slugs: readonly string[]): string {
    if (!slugs.includes(candidate)) return candidate;
    let n = 2;
    while (slugs.includes(`${candidate}-${n}`)) n++;
    return `${candidate}-${n}`;
}

export function getProfileIndex(slug: string, slugs: readonly string[]): number | null {
    const idx = slugs.indexOf(slug);
    return idx >= 0 ? idx + 1 : null;
}
