/**
 * CLI module exports
 */
export { parseArgs, parseInitArgs, parseAddArgs } from "./args";
export { printHelp } from "./help";
export { dispatch } from "./dispatch";
export type { DispatchOptions } from "./dispatch";
