/**
 * Shell detection utilities
 */
import * as path from "path";
import * as os from "os";

export type ShellName = "bash" | "zsh" | "fish";

export function normalizeShell(value: string | null | undefined): ShellName | null {
    if (!value) return null;
    const raw = String(value).trim().toLowerCase();
    if (raw === "bash" || raw === "zsh" || raw === "fish") return raw;
    return null;
}

export function detectShell(
    explicitShell: string | null | undefined,
    env: NodeJS.ProcessEnv = process.env
): ShellName | null {
    if (explicitShell) return normalizeShell(explicitShell);
    const envShell = env.SHELL ? path.basename(env.SHELL) : "";
    return normalizeShell(envShell);
}

export function getShellRcPath(shellName: ShellName, env: NodeJS.ProcessEnv = process.env): string {
    const home = env.HOME || os.homedir();
    if (shellName === "zsh") return path.join(env.ZDOTDIR || home, ".zshrc");
    if (shellName === "fish") {
        const configHome = env.XDG_CONFIG_HOME || path.join(home, ".config");
        return path.join(configHome, "fish", "config.fish");
    }
    return path.join(home, ".bashrc");
}
