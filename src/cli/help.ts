/**
 * Help message for aenv CLI
 */

export function printHelp(): void {
    const msg = `aenv - keep several Anthropic API configs and switch between them

Usage:
  aenv ls | list              List stored configs
  aenv current | show         Show the active config (token hidden)
  aenv use | switch <index|name>
                              Activate a config
  aenv add | new [options]    Create a config interactively and activate it
  aenv edit                   Open the config file in $EDITOR
  aenv auto                   Pick a config for a new shell session
  aenv confirm                Choose a config if none was confirmed yet
  aenv unset                  Clear all exported variables
  aenv path                   Print the config file path
  aenv init [--print] [--shell <bash|zsh|fish>]
                              Install the shell helper (or print it)
  aenv run [--] [args...]     Run claude with the active config
  aenv <anything else>        Same as: aenv run <anything else>

Options:
  -c, --config <path>   Path to the config file
  -h, --help            Show help

Add options:
  -n, --name <name>           Config name (default: derived from the URL host)
  -u, --url <url>             Base URL
  -m, --model <model>         Default model
  -s, --small-model <model>   Small/fast model

Environment:
  AE_DEFAULT                  Config picked on startup (index or name)
  ANTHROPIC_ACTIVE_CONFIG     Startup override (index or name)
  AENV_CONFIG                 Config file path
  AENV_COMMAND                Command launched by run (default: claude)
  EDITOR                      Editor used by edit (default: vi)

The activating commands (use, add, auto, confirm, unset) print shell
statements; run \`aenv init\` so your shell evaluates them.

Examples:
  aenv init
  aenv add --url https://api.anthropic.com
  aenv use 2
  aenv use my-proxy
  AE_DEFAULT=my-proxy bash
  claude --help
`;
    console.log(msg);
}
