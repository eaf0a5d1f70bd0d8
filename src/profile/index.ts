/**
 * Profile module exports
 */
export { toIdentifier, toStorageKeyFragment, defaultNameFromUrl } from "./slug";
export { resolveProfileSlug, ensureUniqueSlug, getProfileIndex } from "./resolve";
export { EMPTY_LIST_MESSAGE, buildListRows, formatListRow, formatListLines } from "./display";
