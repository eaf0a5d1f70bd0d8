/**
 * Session module exports
 */
export { activate, activateToken, buildEnvVars } from "./activate";
export { readSessionState, applyActivation, isConfirmed, currentSummary } from "./state";
export { readStartupTokens, runStartup } from "./startup";
