/**
 * Constants for aenv
 */
import type { ProfileField } from "./types";

export const APP_NAME = "aenv";

export const STORE_DIR_NAME = "anthropic-env";
export const STORE_FILE_NAME = "configs.env";
export const STORE_HEADER = [
    "# aenv profiles: one PROFILE line per config, then <SLUG>_<FIELD>=<value>.",
    "# Values are shell-quoted. Run `aenv edit` to change them.",
];

export const REGISTER_KEY = "PROFILE";
export const PROFILE_FIELDS: readonly ProfileField[] = [
    "BASE_URL",
    "AUTH_TOKEN",
    "MODEL",
    "SMALL_FAST_MODEL",
];

export const FALLBACK_SLUG = "cfg";
export const REDACTED = "[HIDDEN]";

export const DEFAULT_EDITOR = "vi";
export const DEFAULT_DELEGATE_COMMAND = "claude";

export const ENV_ACTIVE_SLUG = "ANTHROPIC_ACTIVE_CONFIG_SLUG";
export const ENV_ACTIVE_INDEX = "ANTHROPIC_ACTIVE_CONFIG_INDEX";
export const ENV_ACTIVE_LEGACY = "ANTHROPIC_ACTIVE_CONFIG";
export const ENV_CONFIRMED = "ANTHROPIC_CONFIG_CONFIRMED";
export const ENV_DEFAULT = "AE_DEFAULT";
export const ENV_STORE_PATH = "AENV_CONFIG";
export const ENV_DELEGATE_COMMAND = "AENV_COMMAND";

export const PROFILE_ENV_KEYS = [
    "ANTHROPIC_BASE_URL",
    "ANTHROPIC_AUTH_TOKEN",
    "ANTHROPIC_API_KEY",
    "ANTHROPIC_MODEL",
    "ANTHROPIC_SMALL_FAST_MODEL",
] as const;

export const EXPORTED_ENV_KEYS: readonly string[] = [
    ...PROFILE_ENV_KEYS,
    ENV_ACTIVE_SLUG,
    ENV_ACTIVE_INDEX,
    ENV_ACTIVE_LEGACY,
    ENV_CONFIRMED,
];
