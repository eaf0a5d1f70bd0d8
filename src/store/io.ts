/**
 * Store I/O utilities
 */
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { Profile, ProfileField, ProfileStore } from "../types";
import { APP_NAME, ENV_STORE_PATH, PROFILE_FIELDS, STORE_DIR_NAME, STORE_FILE_NAME, STORE_HEADER } from "../constants";
import { ProfileError, getErrorMessage, isProfileError } from "../errors";
import { resolvePath } from "../shell/utils";
import { FIELD_PROPS, createEmptyStore, formatProfileBlock, parseStoreText } from "./format";

export function getDefaultStorePath(env: NodeJS.ProcessEnv = process.env): string {
    const configHome =
        resolvePath(env.XDG_CONFIG_HOME) ?? path.join(env.HOME || os.homedir(), ".config");
    return path.join(configHome, STORE_DIR_NAME, STORE_FILE_NAME);
}

export function findStorePath(
    explicitPath: string | null,
    env: NodeJS.ProcessEnv = process.env
): string {
    const fromFlag = resolvePath(explicitPath);
    if (fromFlag) return fromFlag;
    const fromEnv = resolvePath(env[ENV_STORE_PATH]);
    if (fromEnv) return fromEnv;
    return getDefaultStorePath(env);
}

export function readStoreFile(
    storePath: string,
    onMalformed?: (error: ProfileError) => void
): ProfileStore {
    if (!fs.existsSync(storePath)) return createEmptyStore();
    let raw: string;
    try {
        raw = fs.readFileSync(storePath, "utf8");
    } catch (err) {
        throw new ProfileError(
            `Cannot read ${storePath}: ${getErrorMessage(err)}`,
            "StoreUnreadable"
        );
    }
    return parseStoreText(raw, storePath, onMalformed);
}

/**
 * Load the store for a command. Malformed lines are skipped with a warning
 * each; a file that cannot be read at all degrades to an empty store.
 */
export function loadStore(storePath: string): ProfileStore {
    try {
        return readStoreFile(storePath, (error) => {
            console.error(`${APP_NAME}: warning: ${error.message}; skipping it.`);
        });
    } catch (err) {
        if (!isProfileError(err, "StoreUnreadable")) throw err;
        console.error(`${APP_NAME}: warning: ${err.message}; ignoring stored configs.`);
        return createEmptyStore();
    }
}

function endsWithNewline(filePath: string): boolean {
    const size = fs.statSync(filePath).size;
    if (size === 0) return true;
    const fd = fs.openSync(filePath, "r");
    try {
        const buffer = Buffer.alloc(1);
        fs.readSync(fd, buffer, 0, 1, size - 1);
        return buffer[0] === 0x0a;
    } finally {
        fs.closeSync(fd);
    }
}

function ensureStoreDir(storePath: string): void {
    const dir = path.dirname(storePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
}

/** Create the store file (owner-only) if it is missing. Returns true when created. */
export function ensureStoreFile(storePath: string): boolean {
    ensureStoreDir(storePath);
    if (fs.existsSync(storePath)) return false;
    fs.writeFileSync(storePath, `${STORE_HEADER.join("\n")}\n\n`, { encoding: "utf8", mode: 0o600 });
    fs.chmodSync(storePath, 0o600);
    return true;
}

/**
 * Append one profile block. Earlier bytes are never rewritten and the whole
 * block goes out in a single write.
 */
export function appendProfile(storePath: string, profile: Profile): void {
    const block = formatProfileBlock(profile);
    ensureStoreFile(storePath);
    const prefix = endsWithNewline(storePath) ? "" : "\n";
    fs.appendFileSync(storePath, `${prefix}${block}`, "utf8");
}

export function addProfileToStore(store: ProfileStore, profile: Profile): ProfileStore {
    const profiles = new Map(store.profiles);
    profiles.set(profile.slug, profile);
    const slugs = store.slugs.includes(profile.slug) ? [...store.slugs] : [...store.slugs, profile.slug];
    return { slugs, profiles };
}

export function isProfileField(value: string): value is ProfileField {
    return PROFILE_FIELDS.some((field) => field === value);
}

export function getProfileField(store: ProfileStore, slug: string, field: string): string {
    const profile = store.profiles.get(slug);
    if (!profile || !isProfileField(field)) return "";
    return profile[FIELD_PROPS[field]];
}
