const ANSI_RESET = "\x1b[0m";

export const ANSI_GREEN = "32";

export function isColorEnabled(stream: NodeJS.WriteStream, env: NodeJS.ProcessEnv = process.env): boolean {
    if (env.NO_COLOR || env.TERM === "dumb") return false;
    return Boolean(stream.isTTY);
}

export function colorize(text: string, colorCode: string, enabled: boolean): string {
    if (!enabled) return text;
    return `\x1b[${colorCode}m${text}${ANSI_RESET}`;
}
