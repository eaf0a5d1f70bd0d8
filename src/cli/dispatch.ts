/**
 * Command dispatch
 */
import type { CommandContext, Prompt } from "../types";
import { APP_NAME } from "../constants";
import { getErrorMessage } from "../errors";
import { findStorePath, loadStore } from "../store/io";
import { readSessionState } from "../session/state";
import { createReadlinePrompt } from "../ui/readline";
import { detectShell, getShellRcPath, getShellSnippet, upsertShellSnippet } from "../shell";
import {
    printList,
    printCurrent,
    printUnset,
    runUse,
    runAdd,
    runEdit,
    runAuto,
    runConfirm,
    runLaunch,
} from "../commands";
import { parseArgs, parseAddArgs, parseInitArgs } from "./args";
import { printHelp } from "./help";

export interface DispatchOptions {
    env?: NodeJS.ProcessEnv;
    createPrompt?: () => Prompt;
}

export async function dispatch(argv: string[], options: DispatchOptions = {}): Promise<number> {
    const env = options.env ?? process.env;
    try {
        const parsed = parseArgs(argv);
        if (parsed.help) {
            printHelp();
            return 0;
        }
        const [cmd, ...rest] = parsed.args;
        const storePath = findStorePath(parsed.configPath, env);

        if (cmd === "init") {
            const initArgs = parseInitArgs(rest);
            const shellName = detectShell(initArgs.shell, env);
            if (!shellName) {
                throw new Error("Unknown shell. Use --shell <bash|zsh|fish> to specify.");
            }
            const snippet = getShellSnippet(shellName);
            if (!initArgs.apply) {
                console.log(snippet);
                return 0;
            }
            const rcPath = getShellRcPath(shellName, env);
            upsertShellSnippet(rcPath, snippet);
            console.log(`Updated shell config: ${rcPath}`);
            return 0;
        }

        if (cmd === "path") {
            console.log(storePath);
            return 0;
        }

        if (cmd === "unset") {
            printUnset(detectShell(null, env));
            return 0;
        }

        const ctx: CommandContext = {
            env,
            storePath,
            store: loadStore(storePath),
            session: readSessionState(env),
            createPrompt: options.createPrompt ?? (() => createReadlinePrompt()),
        };

        if (cmd === "ls" || cmd === "list") {
            printList(ctx.store, ctx.session, ctx.env);
            return 0;
        }
        if (cmd === "current" || cmd === "show") {
            printCurrent(ctx.session);
            return 0;
        }
        if (cmd === "use" || cmd === "switch") {
            return runUse(ctx, rest[0]);
        }
        if (cmd === "add" || cmd === "new") {
            return await runAdd(ctx, parseAddArgs(rest));
        }
        if (cmd === "edit") {
            return runEdit(ctx);
        }
        if (cmd === "auto") {
            return runAuto(ctx);
        }
        if (cmd === "confirm") {
            return await runConfirm(ctx);
        }
        if (cmd === "run") {
            return await runLaunch(ctx, rest[0] === "--" ? rest.slice(1) : rest);
        }
        return await runLaunch(ctx, parsed.args);
    } catch (err: unknown) {
        console.error(`${APP_NAME}: ${getErrorMessage(err)}`);
        return 1;
    }
}
