/**
 * Profile display utilities
 */
import type { ListRow, ProfileStore } from "../types";
import { APP_NAME } from "../constants";
import { getProfileField } from "../store/io";
import { ANSI_GREEN, colorize } from "../ui/style";

export const EMPTY_LIST_MESSAGE = `No Anthropic configs found. Add one with: ${APP_NAME} add`;

export function buildListRows(store: ProfileStore, activeSlug: string | null): ListRow[] {
    return store.slugs.map((slug, i) => ({
        index: i + 1,
        slug,
        url: getProfileField(store, slug, "BASE_URL"),
        model: getProfileField(store, slug, "MODEL"),
        smallFastModel: getProfileField(store, slug, "SMALL_FAST_MODEL"),
        active: slug === activeSlug,
    }));
}

export function formatListRow(row: ListRow): [string, string] {
    return [
        `${String(row.index).padStart(2)}) ${row.slug.padEnd(20)}  URL=${row.url || "[none]"}`,
        `    MODEL=${row.model || "[empty]"}  SMALL=${row.smallFastModel || "[empty]"}`,
    ];
}

export function formatListLines(
    store: ProfileStore,
    activeSlug: string | null,
    color = false
): string[] {
    const rows = buildListRows(store, activeSlug);
    if (rows.length === 0) return [EMPTY_LIST_MESSAGE];
    return rows.flatMap((row) => {
        const lines = formatListRow(row);
        return row.active ? lines.map((line) => colorize(line, ANSI_GREEN, color)) : lines;
    });
}
