/**
 * Shell utility functions
 */
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

export function shellEscape(value: string | number | boolean): string {
    const str = String(value);
    return `'${str.replace(/'/g, `'\\''`)}'`;
}

export function resolvePath(p: string | null | undefined): string | null {
    if (!p) return null;
    if (p.startsWith("~")) {
        return path.join(os.homedir(), p.slice(1));
    }
    if (path.isAbsolute(p)) return p;
    return path.resolve(process.cwd(), p);
}

function isExecutableFile(filePath: string): boolean {
    try {
        if (!fs.statSync(filePath).isFile()) return false;
        fs.accessSync(filePath, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/** Look a command up on PATH the way `type -P` does. */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
    if (!name) return null;
    if (name.includes("/") || name.includes(path.sep)) {
        return isExecutableFile(name) ? path.resolve(name) : null;
    }
    const dirs = String(env.PATH ?? "").split(path.delimiter).filter(Boolean);
    const exts =
        process.platform === "win32"
            ? ["", ...String(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter(Boolean)]
            : [""];
    for (const dir of dirs) {
        for (const ext of exts) {
            const candidate = path.join(dir, `${name}${ext}`);
            if (isExecutableFile(candidate)) return candidate;
        }
    }
    return null;
}
