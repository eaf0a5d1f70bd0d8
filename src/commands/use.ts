/**
 * Use command - switch the active config
 */
import type { Activation, CommandContext } from "../types";
import { APP_NAME } from "../constants";
import { ProfileError, isProfileError } from "../errors";
import { shellEscape } from "../shell/utils";
import { formatListLines } from "../profile/display";
import { activateToken, buildEnvVars } from "../session/activate";
import { applyActivation } from "../session/state";
import { printCurrent } from "./show";

export function buildExportLines(activation: Activation): string[] {
    return Object.entries(buildEnvVars(activation)).map(
        ([key, value]) => `export ${key}=${shellEscape(value)}`
    );
}

export function printExports(activation: Activation): void {
    console.log(buildExportLines(activation).join("\n"));
}

export function requireToken(token: string | undefined): string {
    if (!token || !token.trim()) {
        throw new ProfileError(`Usage: ${APP_NAME} use <index|name>`, "MissingToken");
    }
    return token;
}

export function runUse(ctx: CommandContext, token: string | undefined): number {
    let activation: Activation;
    try {
        activation = activateToken(requireToken(token), ctx.store, true);
    } catch (err) {
        if (!isProfileError(err, "MissingToken")) throw err;
        console.error(err.message);
        const activeSlug = ctx.session.selection ? ctx.session.selection.slug : null;
        console.error(formatListLines(ctx.store, activeSlug).join("\n"));
        return 1;
    }
    printExports(activation);
    printCurrent(applyActivation(ctx.session, activation), console.error);
    return 0;
}
