/**
 * Startup selection: explicit override, then AE_DEFAULT, then the first config
 */
import type {
    ProfileStore,
    SessionState,
    StartupOutcome,
    StartupSkip,
    StartupSource,
    StartupTokens,
} from "../types";
import { ENV_ACTIVE_LEGACY, ENV_DEFAULT } from "../constants";
import { resolveProfileSlug } from "../profile/resolve";
import { activate } from "./activate";

export function readStartupTokens(env: NodeJS.ProcessEnv = process.env): StartupTokens {
    const override = String(env[ENV_ACTIVE_LEGACY] ?? "").trim();
    const defaultToken = String(env[ENV_DEFAULT] ?? "").trim();
    return {
        override: override || null,
        defaultToken: defaultToken || null,
    };
}

export function runStartup(
    store: ProfileStore,
    session: SessionState,
    tokens: StartupTokens
): StartupOutcome {
    const skipped: StartupSkip[] = [];
    // Once a selection exists only an explicit switch may change it.
    if (session.selection) return { state: "kept", skipped };
    if (store.slugs.length === 0) return { state: "idle", skipped };

    const attempts: Array<[StartupSource, string | null]> = [
        ["override", tokens.override],
        ["default", tokens.defaultToken],
        ["first", "1"],
    ];
    for (const [source, token] of attempts) {
        if (!token) continue;
        const slug = resolveProfileSlug(token, store.slugs);
        if (!slug) {
            skipped.push({ source, token });
            continue;
        }
        return { state: "selected", source, activation: activate(slug, store), skipped };
    }
    return { state: "idle", skipped };
}
