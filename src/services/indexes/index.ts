/**
 * Index module.
 */

export { Index } from "./index-handle";
export { tryMakeIndex, waitForIndex } from "./from-task";
export { IndexInfo, IndexesResults } from "./types";
export type { IndexesQuery } from "./types";
