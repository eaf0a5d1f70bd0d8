/**
 * Type definitions for aenv
 */

export type ProfileField = "BASE_URL" | "AUTH_TOKEN" | "MODEL" | "SMALL_FAST_MODEL";

export interface Profile {
    slug: string;
    baseUrl: string;
    authToken: string;
    model: string;
    smallFastModel: string;
}

/** Ordered slugs (display order, 1-based index basis) plus each slug's record. */
export interface ProfileStore {
    slugs: string[];
    profiles: Map<string, Profile>;
}

export interface ActiveSelection {
    slug: string;
    /** 1-based position in the store; null when the inherited env carries no usable index. */
    index: number | null;
    confirmed: boolean;
}

export interface ProfileEnv {
    ANTHROPIC_BASE_URL: string;
    ANTHROPIC_AUTH_TOKEN: string;
    ANTHROPIC_API_KEY: string;
    ANTHROPIC_MODEL: string;
    ANTHROPIC_SMALL_FAST_MODEL: string;
}

export interface Activation {
    selection: ActiveSelection & { index: number };
    env: ProfileEnv;
}

export interface SessionState {
    selection: ActiveSelection | null;
    env: ProfileEnv;
}

export type StartupSource = "override" | "default" | "first";

export type StartupOutcome =
    | { state: "kept"; skipped: StartupSkip[] }
    | { state: "idle"; skipped: StartupSkip[] }
    | { state: "selected"; source: StartupSource; activation: Activation; skipped: StartupSkip[] };

export interface StartupSkip {
    source: StartupSource;
    token: string;
}

export interface StartupTokens {
    override: string | null;
    defaultToken: string | null;
}

export interface ParsedArgs {
    args: string[];
    configPath: string | null;
    help: boolean;
}

export interface InitArgs {
    apply: boolean;
    shell: string | null;
}

export interface AddArgs {
    name: string | null;
    url: string | null;
    model: string | null;
    smallModel: string | null;
}

export interface ListRow {
    index: number;
    slug: string;
    url: string;
    model: string;
    smallFastModel: string;
    active: boolean;
}

export interface Prompt {
    ask(question: string): Promise<string>;
    /** Like ask, but the typed answer is not echoed. */
    askSecret(question: string): Promise<string>;
    close(): void;
}

export interface CommandContext {
    env: NodeJS.ProcessEnv;
    storePath: string;
    store: ProfileStore;
    session: SessionState;
    createPrompt: () => Prompt;
}
