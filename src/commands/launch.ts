/**
 * Launch the downstream CLI with the active config applied
 */
import { spawn } from "child_process";
import type { CommandContext } from "../types";
import { APP_NAME, DEFAULT_DELEGATE_COMMAND, ENV_DELEGATE_COMMAND } from "../constants";
import { findExecutable } from "../shell/utils";
import { runFirstUse } from "../ui/interactive";
import { buildEnvVars } from "../session/activate";
import { applyActivation, isConfirmed } from "../session/state";
import { printCurrent } from "./show";

export function getDelegateCommand(env: NodeJS.ProcessEnv): string {
    const raw = String(env[ENV_DELEGATE_COMMAND] ?? "").trim();
    return raw || DEFAULT_DELEGATE_COMMAND;
}

export function spawnDelegate(
    binPath: string,
    args: string[],
    env: NodeJS.ProcessEnv
): Promise<number> {
    const child = spawn(binPath, args, { stdio: "inherit", env });

    const forwardSignal = (signal: NodeJS.Signals) => {
        child.kill(signal);
    };
    process.on("SIGINT", forwardSignal);
    process.on("SIGTERM", forwardSignal);
    const cleanup = () => {
        process.off("SIGINT", forwardSignal);
        process.off("SIGTERM", forwardSignal);
    };

    return new Promise<number>((resolve) => {
        child.on("error", (err) => {
            cleanup();
            console.error(`${APP_NAME}: failed to launch ${binPath}: ${err.message}`);
            resolve(1);
        });
        child.on("exit", (code, signal) => {
            cleanup();
            if (typeof code === "number") {
                resolve(code);
                return;
            }
            resolve(signal ? 1 : 0);
        });
    });
}

export async function runLaunch(ctx: CommandContext, args: string[]): Promise<number> {
    let session = ctx.session;
    const env: NodeJS.ProcessEnv = { ...ctx.env };

    if (!isConfirmed(session)) {
        const prompt = ctx.createPrompt();
        try {
            const { activation } = await runFirstUse(ctx.store, session, ctx.storePath, prompt);
            session = applyActivation(session, activation);
            Object.assign(env, buildEnvVars(activation));
        } finally {
            prompt.close();
        }
    }

    const command = getDelegateCommand(env);
    const binPath = findExecutable(command, env);
    if (!binPath) {
        console.log(`Note: no '${command}' CLI found in PATH. Environment is set:`);
        printCurrent(session);
        return 0;
    }
    return spawnDelegate(binPath, args, env);
}
