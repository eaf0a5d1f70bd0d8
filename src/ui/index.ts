/**
 * UI module exports
 */
export { createReadlinePrompt, askWithDefault } from "./readline";
export { EMPTY_ADD_ARGS, runInteractiveAdd, runFirstUse } from "./interactive";
export { isColorEnabled, colorize } from "./style";
