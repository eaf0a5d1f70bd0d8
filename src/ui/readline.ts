/**
 * Readline utilities
 */
import * as readline from "readline";
import { Writable } from "stream";
import type { Prompt } from "../types";

/**
 * Prompts are written to stderr: stdout of the activating commands is
 * evaluated by the shell helper.
 */
export function createReadlinePrompt(
    input: NodeJS.ReadStream = process.stdin,
    output: NodeJS.WriteStream = process.stderr
): Prompt {
    let muted = false;
    const sink = new Writable({
        write(chunk, encoding, callback) {
            if (!muted) output.write(chunk, encoding);
            callback();
        },
    });
    const rl = readline.createInterface({
        input,
        output: sink,
        terminal: Boolean(input.isTTY),
    });
    let closed = false;
    rl.on("close", () => {
        closed = true;
    });

    const question = (text: string): Promise<string> =>
        new Promise((resolve) => {
            if (closed) {
                resolve("");
                return;
            }
            const onClose = () => resolve("");
            rl.once("close", onClose);
            rl.question(text, (answer) => {
                rl.off("close", onClose);
                resolve(answer);
            });
        });

    return {
        ask: question,
        async askSecret(text: string): Promise<string> {
            output.write(text);
            muted = true;
            try {
                return await question("");
            } finally {
                muted = false;
                output.write("\n");
            }
        },
        close: () => rl.close(),
    };
}

export async function askWithDefault(
    prompt: Prompt,
    question: string,
    fallback: string
): Promise<string> {
    const answer = String(await prompt.ask(question)).trim();
    return answer || fallback;
}
