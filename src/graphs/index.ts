export { START, END, type Start, type End } from "./constants";
export { StateGraph, type BranchMapping } from "./state-graph";
export { CompiledGraph, type CompiledGraphParams } from "./compiled-graph";
export { NodeSequence } from "./node-sequence";
export { EdgeTable, type Branch, type BranchFunction } from "./edge-table";
export { RuntimeContext, NodeContext, type RunStatus, type RuntimeContextOptions } from "./runtime-context";
export { STATE_MERGE } from "./registry";
export { appendReducer, replaceReducer } from "./reducers";
export {
    type GraphResult,
    type RunConfig,
    type ThreadConfig,
    type CompileOptions,
    type StateSnapshot,
    type StepUpdate,
    type NodeUpdate,
} from "./types";
export { BaseCheckpointer } from "./store/base-checkpointer";
export { MemoryCheckpointer } from "./store/memory-checkpointer";
export { SQLiteCheckpointer } from "./store/sqlite-checkpointer";
export { StoredThread } from "./store/stored-thread";
export { type Checkpoint, type CheckpointDraft } from "./store/checkpoint";
