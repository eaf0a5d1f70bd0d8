/**
 * Edit command - open the store in $EDITOR, then reload it
 */
import { spawnSync } from "child_process";
import type { CommandContext } from "../types";
import { DEFAULT_EDITOR } from "../constants";
import { ensureStoreFile, loadStore } from "../store/io";

export function getEditorCommand(env: NodeJS.ProcessEnv): string[] {
    const raw = String(env.EDITOR ?? "").trim();
    return (raw || DEFAULT_EDITOR).split(/\s+/);
}

export function runEdit(ctx: CommandContext): number {
    ensureStoreFile(ctx.storePath);
    const [command, ...args] = getEditorCommand(ctx.env);
    const result = spawnSync(command, [...args, ctx.storePath], {
        stdio: "inherit",
        env: ctx.env,
    });
    if (result.error) {
        throw new Error(`failed to launch ${command}: ${result.error.message}`);
    }
    if (result.status !== 0) {
        throw new Error(`${command} exited with ${result.status ?? result.signal}`);
    }
    const store = loadStore(ctx.storePath);
    console.log(`Reloaded configs (${store.slugs.length} found).`);
    return 0;
}
