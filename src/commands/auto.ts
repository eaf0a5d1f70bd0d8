/**
 * Auto command - pick the session's config on shell startup
 */
import type { CommandContext, StartupSource } from "../types";
import { APP_NAME, ENV_ACTIVE_LEGACY, ENV_DEFAULT } from "../constants";
import { readStartupTokens, runStartup } from "../session/startup";
import { printExports } from "./use";

const SOURCE_LABELS: Record<StartupSource, string> = {
    override: ENV_ACTIVE_LEGACY,
    default: ENV_DEFAULT,
    first: "first config",
};

export function runAuto(ctx: CommandContext): number {
    const outcome = runStartup(ctx.store, ctx.session, readStartupTokens(ctx.env));
    for (const skip of outcome.skipped) {
        console.error(`${APP_NAME}: Unknown config: ${skip.token} (from ${SOURCE_LABELS[skip.source]})`);
    }
    if (outcome.state === "selected") printExports(outcome.activation);
    return 0;
}
