/**
 * Session state carried between invocations through the shell environment
 */
import type { Activation, ProfileEnv, SessionState } from "../types";
import { ENV_ACTIVE_INDEX, ENV_ACTIVE_SLUG, ENV_CONFIRMED, REDACTED } from "../constants";

function readProfileEnv(env: NodeJS.ProcessEnv): ProfileEnv {
    return {
        ANTHROPIC_BASE_URL: env.ANTHROPIC_BASE_URL ?? "",
        ANTHROPIC_AUTH_TOKEN: env.ANTHROPIC_AUTH_TOKEN ?? "",
        ANTHROPIC_API_KEY: env.ANTHROPIC_API_KEY ?? "",
        ANTHROPIC_MODEL: env.ANTHROPIC_MODEL ?? "",
        ANTHROPIC_SMALL_FAST_MODEL: env.ANTHROPIC_SMALL_FAST_MODEL ?? "",
    };
}

export function readSessionState(env: NodeJS.ProcessEnv = process.env): SessionState {
    const slug = String(env[ENV_ACTIVE_SLUG] ?? "").trim();
    if (!slug) {
        return { selection: null, env: readProfileEnv(env) };
    }
    const rawIndex = String(env[ENV_ACTIVE_INDEX] ?? "").trim();
    const index = /^[0-9]+$/.test(rawIndex) ? Number.parseInt(rawIndex, 10) : 0;
    return {
        selection: {
            slug,
            index: index > 0 ? index : null,
            confirmed: Boolean(env[ENV_CONFIRMED]),
        },
        env: readProfileEnv(env),
    };
}

export function applyActivation(session: SessionState, activation: Activation): SessionState {
    const wasConfirmed = session.selection ? session.selection.confirmed : false;
    return {
        selection: {
            ...activation.selection,
            confirmed: activation.selection.confirmed || wasConfirmed,
        },
        env: { ...activation.env },
    };
}

export function isConfirmed(session: SessionState): boolean {
    return Boolean(session.selection && session.selection.confirmed);
}

export function currentSummary(session: SessionState): string[] {
    const { selection, env } = session;
    if (!selection) return ["No active Anthropic config."];
    return [
        `Active Anthropic config: ${selection.index ?? "?"}) ${selection.slug}`,
        `  ANTHROPIC_BASE_URL=${env.ANTHROPIC_BASE_URL}`,
        `  ANTHROPIC_MODEL=${env.ANTHROPIC_MODEL || "[empty]"}`,
        `  ANTHROPIC_SMALL_FAST_MODEL=${env.ANTHROPIC_SMALL_FAST_MODEL || "[empty]"}`,
        `  ANTHROPIC_AUTH_TOKEN=${REDACTED}`,
    ];
}
