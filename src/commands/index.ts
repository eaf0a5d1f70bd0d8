/**
 * Commands module exports
 */
export { buildExportLines, printExports, requireToken, runUse } from "./use";
export { printList } from "./list";
export { runAdd } from "./add";
export { printCurrent } from "./show";
export { runEdit, getEditorCommand } from "./edit";
export { runAuto } from "./auto";
export { runConfirm } from "./confirm";
export { buildUnsetLines, printUnset } from "./unset";
export { runLaunch, spawnDelegate, getDelegateCommand } from "./launch";
