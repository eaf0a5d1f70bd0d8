/**
 * Shell module exports
 */
export { normalizeShell, detectShell, getShellRcPath } from "./detect";
export type { ShellName } from "./detect";
export { getShellSnippet, escapeRegExp, upsertShellSnippet } from "./snippet";
export { shellEscape, resolvePath, findExecutable } from "./utils";
