/**
 * CLI argument parsing
 */
import type { AddArgs, InitArgs, ParsedArgs } from "../types";

/**
 * Global options are only read before the command; everything from the
 * first other argument on is passed through untouched.
 */
export function parseArgs(argv: string[]): ParsedArgs {
    let configPath: string | null = null;
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === "-h" || arg === "--help") {
            return { args: [], configPath, help: true };
        }
        if (arg === "-c" || arg === "--config") {
            const val = argv[i + 1];
            if (!val) throw new Error("Missing value for --config.");
            configPath = val;
            i++;
            continue;
        }
        if (arg.startsWith("--config=")) {
            configPath = arg.slice("--config=".length);
            continue;
        }
        return { args: argv.slice(i), configPath, help: false };
    }
    return { args: [], configPath, help: false };
}

export function parseInitArgs(args: string[]): InitArgs {
    const result: InitArgs = { apply: true, shell: null };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--apply") {
            result.apply = true;
            continue;
        }
        if (arg === "--print") {
            result.apply = false;
            continue;
        }
        if (arg === "--shell") {
            const val = args[i + 1];
            if (!val) throw new Error("Missing value for --shell.");
            result.shell = val;
            i++;
            continue;
        }
        if (arg.startsWith("--shell=")) {
            result.shell = arg.slice("--shell=".length);
            continue;
        }
        throw new Error(`Unknown init argument: ${arg}`);
    }
    return result;
}

const ADD_FLAGS: Array<{ short: string; long: string; key: keyof AddArgs }> = [
    { short: "-n", long: "--name", key: "name" },
    { short: "-u", long: "--url", key: "url" },
    { short: "-m", long: "--model", key: "model" },
    { short: "-s", long: "--small-model", key: "smallModel" },
];

export function parseAddArgs(args: string[]): AddArgs {
    const result: AddArgs = { name: null, url: null, model: null, smallModel: null };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (result.name === null && !arg.startsWith("-")) {
            result.name = arg;
            continue;
        }
        const flag = ADD_FLAGS.find(
            (candidate) =>
                arg === candidate.short ||
                arg === candidate.long ||
                arg.startsWith(`${candidate.long}=`)
        );
        if (!flag) throw new Error(`Unknown add argument: ${arg}`);
        if (arg.startsWith(`${flag.long}=`)) {
            result[flag.key] = arg.slice(flag.long.length + 1);
            continue;
        }
        const val = args[i + 1];
        if (val === undefined) throw new Error(`Missing value for ${flag.long}.`);
        result[flag.key] = val;
        i++;
    }

    return result;
}
