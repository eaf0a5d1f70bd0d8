/**
 * Shell helper generation
 *
 * The helper evaluates the export lines printed by the activating commands
 * (looking past a leading -c/--config) and wraps `claude` so unknown
 * subcommands run through `aenv run`.
 */
import * as fs from "fs";
import * as path from "path";
import type { ShellName } from "./detect";

const MARKER_START = "# >>> aenv >>>";
const MARKER_END = "# <<< aenv <<<";

const EVAL_COMMANDS = ["use", "switch", "add", "new", "auto", "confirm", "unset"];
const MANAGE_COMMANDS = ["ls", "list", "current", "show", "use", "switch", "add", "new", "edit"];

export function getShellSnippet(shellName: ShellName): string {
    if (shellName === "fish") {
        return [
            "function aenv",
            "  set -l __aenv_cmd $argv[1]",
            '  switch "$argv[1]"',
            "    case -c --config",
            "      set __aenv_cmd $argv[3]",
            "    case '--config=*'",
            "      set __aenv_cmd $argv[2]",
            "  end",
            '  switch "$__aenv_cmd"',
            `    case ${EVAL_COMMANDS.join(" ")}`,
            "      set -l __aenv_out (command aenv $argv)",
            "      or return $status",
            "      printf '%s\\n' $__aenv_out | source",
            "    case '*'",
            "      command aenv $argv",
            "  end",
            "end",
            "function claude",
            '  switch "$argv[1]"',
            `    case ${MANAGE_COMMANDS.join(" ")}`,
            "      aenv $argv",
            "    case '*'",
            '      if test -z "$ANTHROPIC_CONFIG_CONFIRMED"',
            "        aenv confirm; or return $status",
            "      end",
            "      command aenv run -- $argv",
            "  end",
            "end",
            "aenv auto",
        ].join("\n");
    }
    return [
        "aenv() {",
        '  local __aenv_cmd="$1"',
        '  case "$1" in',
        '    -c|--config) __aenv_cmd="${3:-}" ;;',
        '    --config=*) __aenv_cmd="${2:-}" ;;',
        "  esac",
        '  case "$__aenv_cmd" in',
        `    ${EVAL_COMMANDS.join("|")})`,
        "      local __aenv_out",
        '      __aenv_out="$(command aenv "$@")" || return $?',
        '      eval "$__aenv_out"',
        "      ;;",
        "    *)",
        '      command aenv "$@"',
        "      ;;",
        "  esac",
        "}",
        "claude() {",
        '  case "$1" in',
        `    ${MANAGE_COMMANDS.join("|")})`,
        '      aenv "$@"',
        "      ;;",
        "    *)",
        '      if [ -z "${ANTHROPIC_CONFIG_CONFIRMED:-}" ]; then',
        "        aenv confirm || return $?",
        "      fi",
        '      command aenv run -- "$@"',
        "      ;;",
        "  esac",
        "}",
        "aenv auto",
    ].join("\n");
}

export function escapeRegExp(value: string): string {
    return String(value).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function upsertShellSnippet(rcPath: string, snippet: string): void {
    const block = `${MARKER_START}\n${snippet}\n${MARKER_END}`;
    const existing = fs.existsSync(rcPath) ? fs.readFileSync(rcPath, "utf8") : "";
    let updated: string;

    if (existing.includes(MARKER_START) && existing.includes(MARKER_END)) {
        const re = new RegExp(
            `${escapeRegExp(MARKER_START)}[\\s\\S]*?${escapeRegExp(MARKER_END)}`
        );
        updated = existing.replace(re, () => block);
    } else if (existing.trim().length === 0) {
        updated = `${block}\n`;
    } else {
        const sep = existing.endsWith("\n") ? "\n" : "\n\n";
        updated = `${existing}${sep}${block}\n`;
    }

    const dir = path.dirname(rcPath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(rcPath, updated, "utf8");
}
