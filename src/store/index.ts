/**
 * Store module exports
 */
export {
    getDefaultStorePath,
    findStorePath,
    readStoreFile,
    loadStore,
    ensureStoreFile,
    appendProfile,
    addProfileToStore,
    isProfileField,
    getProfileField,
} from "./io";
export {
    FIELD_PROPS,
    createEmptyStore,
    createEmptyProfile,
    parseShellValue,
    parseStoreText,
    formatProfileBlock,
} from "./format";
