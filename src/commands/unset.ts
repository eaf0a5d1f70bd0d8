/**
 * Unset command - print statements clearing every exported variable
 */
import { EXPORTED_ENV_KEYS } from "../constants";

export function buildUnsetLines(shellName: string | null): string[] {
    if (shellName === "fish") return EXPORTED_ENV_KEYS.map((key) => `set -e ${key}`);
    return EXPORTED_ENV_KEYS.map((key) => `unset ${key}`);
}

export function printUnset(shellName: string | null): void {
    console.log(buildUnsetLines(shellName).join("\n"));
}
