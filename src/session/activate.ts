/**
 * Profile activation: stored fields -> exported environment
 */
import type { Activation, ProfileStore } from "../types";
import { ENV_ACTIVE_INDEX, ENV_ACTIVE_LEGACY, ENV_ACTIVE_SLUG, ENV_CONFIRMED } from "../constants";
import { ProfileError } from "../errors";
import { getProfileIndex, resolveProfileSlug } from "../profile/resolve";
import { getProfileField } from "../store/io";

export function activate(slug: string, store: ProfileStore, confirmed = false): Activation {
    const index = getProfileIndex(slug, store.slugs);
    if (index === null) {
        throw new ProfileError(`Unknown config: ${slug}`, "UnknownProfile");
    }
    const authToken = getProfileField(store, slug, "AUTH_TOKEN");
    return {
        selection: { slug, index, confirmed },
        env: {
            ANTHROPIC_BASE_URL: getProfileField(store, slug, "BASE_URL"),
            ANTHROPIC_AUTH_TOKEN: authToken,
            ANTHROPIC_API_KEY: authToken,
            ANTHROPIC_MODEL: getProfileField(store, slug, "MODEL"),
            ANTHROPIC_SMALL_FAST_MODEL: getProfileField(store, slug, "SMALL_FAST_MODEL"),
        },
    };
}

/** Resolve an index or name, then activate it. */
export function activateToken(token: string, store: ProfileStore, confirmed = false): Activation {
    const slug = resolveProfileSlug(token, store.slugs);
    if (!slug) {
        throw new ProfileError(`Unknown config: ${token}`, "UnresolvedIdentifier");
    }
    return activate(slug, store, confirmed);
}

/**
 * Every variable an activation exports. The confirmation flag is only ever
 * set, never cleared, so it is left out of unconfirmed activations.
 */
export function buildEnvVars(activation: Activation): Record<string, string> {
    const { selection, env } = activation;
    const vars: Record<string, string> = {
        ...env,
        [ENV_ACTIVE_SLUG]: selection.slug,
        [ENV_ACTIVE_INDEX]: String(selection.index),
        [ENV_ACTIVE_LEGACY]: String(selection.index),
    };
    if (selection.confirmed) vars[ENV_CONFIRMED] = "1";
    return vars;
}
