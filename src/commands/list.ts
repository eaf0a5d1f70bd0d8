/**
 * List command - show all configs in store order
 */
import type { ProfileStore, SessionState } from "../types";
import { formatListLines } from "../profile/display";
import { isColorEnabled } from "../ui/style";

export function printList(
    store: ProfileStore,
    session: SessionState,
    env: NodeJS.ProcessEnv = process.env
): void {
    const activeSlug = session.selection ? session.selection.slug : null;
    const lines = formatListLines(store, activeSlug, isColorEnabled(process.stdout, env));
    console.log(lines.join("\n"));
}
