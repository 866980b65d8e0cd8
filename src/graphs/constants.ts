/** Virtual entry node. Never executed; its outgoing edges pick the first nodes. */
export const START = "__start__";
/** Virtual terminal node. Reaching it ends the run. */
export const END = "__end__";

export type Start = typeof START;
export type End = typeof END;
