/**
 * Confirm command - first-use selection for the shell helper
 */
import type { CommandContext } from "../types";
import { runFirstUse } from "../ui/interactive";
import { applyActivation, isConfirmed } from "../session/state";
import { printExports } from "./use";
import { printCurrent } from "./show";

export async function runConfirm(ctx: CommandContext): Promise<number> {
    if (isConfirmed(ctx.session)) return 0;
    const prompt = ctx.createPrompt();
    try {
        const { activation } = await runFirstUse(ctx.store, ctx.session, ctx.storePath, prompt);
        printExports(activation);
        printCurrent(applyActivation(ctx.session, activation), console.error);
        return 0;
    } finally {
        prompt.close();
    }
}
