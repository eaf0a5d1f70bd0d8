/**
 * Add command - create a config interactively and activate it
 */
import type { AddArgs, CommandContext } from "../types";
import { runInteractiveAdd } from "../ui/interactive";
import { activate } from "../session/activate";
import { applyActivation } from "../session/state";
import { printExports } from "./use";
import { printCurrent } from "./show";

export async function runAdd(ctx: CommandContext, addArgs: AddArgs): Promise<number> {
    const prompt = ctx.createPrompt();
    try {
        const { profile, store } = await runInteractiveAdd(ctx.store, ctx.storePath, prompt, addArgs);
        const activation = activate(profile.slug, store);
        printExports(activation);
        printCurrent(applyActivation(ctx.session, activation), console.error);
        return 0;
    } finally {
        prompt.close();
    }
}
