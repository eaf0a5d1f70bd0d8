/**
 * Show command - summarize the active config
 */
import type { SessionState } from "../types";
import { currentSummary } from "../session/state";

export function printCurrent(session: SessionState, write: (line: string) => void = console.log): void {
    for (const line of currentSummary(session)) write(line);
}
