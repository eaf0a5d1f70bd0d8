/**
 * Store file format: PROFILE registrations and <FRAGMENT>_<FIELD> assignments
 */
import type { Profile, ProfileField, ProfileStore } from "../types";
import { PROFILE_FIELDS, REGISTER_KEY } from "../constants";
import { ProfileError, getErrorMessage } from "../errors";
import { toIdentifier, toStorageKeyFragment } from "../profile/slug";
import { shellEscape } from "../shell/utils";

type ProfileValueKey = Exclude<keyof Profile, "slug">;

export const FIELD_PROPS: Record<ProfileField, ProfileValueKey> = {
    BASE_URL: "baseUrl",
    AUTH_TOKEN: "authToken",
    MODEL: "model",
    SMALL_FAST_MODEL: "smallFastModel",
};

interface Assignment {
    key: string;
    value: string;
    block: string | null;
}

export function createEmptyStore(): ProfileStore {
    return { slugs: [], profiles: new Map() };
}

export function createEmptyProfile(slug: string): Profile {
    return { slug, baseUrl: "", authToken: "", model: "", smallFastModel: "" };
}

/**
 * Parse one right-hand side the way a POSIX shell reads a single word:
 * single quotes, double quotes, backslash escapes and bare characters.
 */
export function parseShellValue(raw: string): string {
    let out = "";
    let i = 0;
    while (i < raw.length) {
        const ch = raw[i];
        if (ch === "'") {
            const end = raw.indexOf("'", i + 1);
            if (end < 0) throw new Error("unterminated single quote");
            out += raw.slice(i + 1, end);
            i = end + 1;
            continue;
        }
        if (ch === '"') {
            i++;
            let closed = false;
            while (i < raw.length) {
                const c = raw[i];
                if (c === "\\" && i + 1 < raw.length && '"\\$`'.includes(raw[i + 1])) {
                    out += raw[i + 1];
                    i += 2;
                    continue;
                }
                if (c === '"') {
                    closed = true;
                    i++;
                    break;
                }
                out += c;
                i++;
            }
            if (!closed) throw new Error("unterminated double quote");
            continue;
        }
        if (ch === "\\") {
            if (i + 1 >= raw.length) throw new Error("dangling backslash");
            out += raw[i + 1];
            i += 2;
            continue;
        }
        if (/\s/.test(ch)) {
            const rest = raw.slice(i).trim();
            if (rest === "" || rest.startsWith("#")) break;
            throw new Error("unquoted whitespace in value");
        }
        out += ch;
        i++;
    }
    return out;
}

function splitFieldKey(key: string): Array<{ fragment: string; field: ProfileField }> {
    const splits: Array<{ fragment: string; field: ProfileField }> = [];
    for (const field of PROFILE_FIELDS) {
        const suffix = `_${field}`;
        if (key.length > suffix.length && key.endsWith(suffix)) {
            splits.push({ fragment: key.slice(0, -suffix.length), field });
        }
    }
    return splits;
}

/**
 * Parse the whole store. Without `onMalformed` the first malformed line
 * throws; with it, each malformed line is reported and skipped.
 */
export function parseStoreText(
    text: string,
    source = "store",
    onMalformed?: (error: ProfileError) => void
): ProfileStore {
    const slugs: string[] = [];
    const assignments: Assignment[] = [];
    let block: string | null = null;

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const trimmed = lines[i].trim();
        if (!trimmed || trimmed.startsWith("#")) continue;
        const statement = trimmed.replace(/^export\s+/, "");
        const reject = (reason?: string): void => {
            const detail = reason ? ` (${reason})` : "";
            const error = new ProfileError(
                `Malformed line ${i + 1} in ${source}${detail}`,
                "StoreUnreadable"
            );
            if (!onMalformed) throw error;
            onMalformed(error);
        };
        const match = statement.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
        if (!match) {
            reject();
            continue;
        }
        const [, key, rawValue] = match;
        let value: string;
        try {
            value = parseShellValue(rawValue);
        } catch (err) {
            reject(getErrorMessage(err));
            continue;
        }
        if (key === REGISTER_KEY) {
            if (!value.trim()) continue;
            const slug = toIdentifier(value);
            if (!slugs.includes(slug)) slugs.push(slug);
            block = slug;
            continue;
        }
        assignments.push({ key, value, block });
    }

    const owners = new Map<string, string[]>();
    const profiles = new Map<string, Profile>();
    for (const slug of slugs) {
        profiles.set(slug, createEmptyProfile(slug));
        const fragment = toStorageKeyFragment(slug);
        owners.set(fragment, [...(owners.get(fragment) ?? []), slug]);
    }

    for (const assignment of assignments) {
        const candidates = splitFieldKey(assignment.key).flatMap(({ fragment, field }) =>
            (owners.get(fragment) ?? []).map((slug) => ({ slug, field }))
        );
        if (candidates.length === 0) continue;
        const target =
            candidates.find((candidate) => candidate.slug === assignment.block) ?? candidates[0];
        const profile = profiles.get(target.slug);
        if (profile) profile[FIELD_PROPS[target.field]] = assignment.value;
    }

    return { slugs, profiles };
}

export function formatProfileBlock(profile: Profile): string {
    const fragment = toStorageKeyFragment(profile.slug);
    const lines = [`${REGISTER_KEY}=${shellEscape(profile.slug)}`];
    for (const field of PROFILE_FIELDS) {
        const value = profile[FIELD_PROPS[field]];
        if (/[\r\n]/.test(value)) {
            throw new Error(`Value for ${field} cannot contain line breaks.`);
        }
        lines.push(`${fragment}_${field}=${shellEscape(value)}`);
    }
    return `${lines.join("\n")}\n\n`;
}
